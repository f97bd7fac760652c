/**
 * Referral Split settlement engine
 *
 * @example
 * ```typescript
 * import { createSettlementEngine, InMemoryLedger } from '@referral-split/engine';
 *
 * const ledger = new InMemoryLedger([[payer, 5_000_000_000n]]);
 * const engine = createSettlementEngine({ config, ledger });
 * const receipt = engine.settle(instruction);
 * ```
 */

export {
	createSettlementEngine,
	planTransfers,
	type SettlementEngine,
	type SettlementEngineOptions,
	type SettlementInstruction,
	type SettlementReceipt,
	type SettlementResult,
	type SettlementTransfer,
} from "./engine.js";

export {
	InMemoryLedger,
	type BalanceLedger,
	type Transfer,
} from "./ledger.js";
