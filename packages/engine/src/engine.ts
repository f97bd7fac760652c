/**
 * Settlement engine
 *
 * Executes one distribution instruction as a single atomic unit:
 * decode → validate accounts → allocate → transfer (commit or abort).
 * No state survives between calls and nothing is retried.
 */

import type {
	AccountMeta,
	Address,
	ReadonlyUint8Array,
} from "@solana/kit";
import {
	ALLOCATION_ORDER,
	type Allocation,
	type AllocationRole,
	type DistributionAccounts,
	type DistributorConfig,
	DistributorError,
	type DistributorErrorCode,
	type PaymentRequest,
	allocate,
	decodePaymentRequest,
	parseDistributionAccounts,
} from "@referral-split/sdk";
import type { BalanceLedger, Transfer } from "./ledger.js";

// =============================================================================
// Types
// =============================================================================

/**
 * The parts of an instruction the engine reads. Any @solana/kit
 * `Instruction` satisfies it.
 */
export interface SettlementInstruction {
	accounts?: readonly AccountMeta[];
	data?: ReadonlyUint8Array | Uint8Array;
}

export interface SettlementTransfer extends Transfer {
	role: AllocationRole;
}

/**
 * What a successful settlement applied.
 */
export interface SettlementReceipt {
	request: PaymentRequest;
	accounts: DistributionAccounts;
	allocation: Allocation;
	/** Nonzero transfers out of the payer, in application order */
	transfers: SettlementTransfer[];
}

export type SettlementResult =
	| { status: "settled"; receipt: SettlementReceipt }
	| {
			status: "rejected";
			reason: DistributorErrorCode;
			message: string;
			error: DistributorError;
	  };

export interface SettlementEngine {
	readonly config: DistributorConfig;
	/** Settle or throw a `DistributorError`; a throw leaves the ledger untouched */
	settle(instruction: SettlementInstruction): SettlementReceipt;
	/** Same as `settle`, reporting failure as a result */
	trySettle(instruction: SettlementInstruction): SettlementResult;
}

export interface SettlementEngineOptions {
	config: DistributorConfig;
	ledger: BalanceLedger;
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Create a settlement engine bound to one configuration and ledger.
 *
 * @example
 * ```typescript
 * const engine = createSettlementEngine({ config, ledger });
 * const result = engine.trySettle(instruction);
 * if (result.status === "rejected") console.error(result.reason, result.message);
 * ```
 */
export function createSettlementEngine(
	options: SettlementEngineOptions,
): SettlementEngine {
	const { config, ledger } = options;

	function settle(instruction: SettlementInstruction): SettlementReceipt {
		const request = decodePaymentRequest(instruction.data);
		const accounts = parseDistributionAccounts(
			instruction.accounts,
			request,
			config,
		);
		const allocation = allocate(request, config.caps);
		const transfers = planTransfers(accounts, allocation);

		ledger.transferBatch(accounts.payer, transfers);

		return { request, accounts, allocation, transfers };
	}

	return {
		config,
		settle,
		trySettle(instruction) {
			try {
				return { status: "settled", receipt: settle(instruction) };
			} catch (error) {
				if (error instanceof DistributorError) {
					return {
						status: "rejected",
						reason: error.code,
						message: error.message,
						error,
					};
				}
				throw error;
			}
		},
	};
}

/**
 * One transfer per nonzero share. Zero shares produce nothing, so an absent
 * referrer (whose slot repeats the payer) never moves funds.
 */
export function planTransfers(
	accounts: DistributionAccounts,
	allocation: Allocation,
): SettlementTransfer[] {
	const destinations: Record<AllocationRole, Address | null> = {
		treasury: accounts.treasury,
		team: accounts.team,
		first: accounts.firstReferrer,
		second: accounts.secondReferrer,
	};

	const transfers: SettlementTransfer[] = [];
	for (const role of ALLOCATION_ORDER) {
		const destination = destinations[role];
		const amount = allocation[role];
		if (destination !== null && amount > 0n) {
			transfers.push({ role, destination, amount });
		}
	}
	return transfers;
}
