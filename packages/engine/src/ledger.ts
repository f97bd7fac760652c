/**
 * Balance ledger
 *
 * The host primitive the engine settles against: a batch of transfers out of
 * one source account, applied entirely or not at all.
 */

import { type Address, isAddress } from "@solana/kit";
import {
	AccountShapeError,
	ArithmeticOverflowError,
	InsufficientBalanceError,
	U64_MAX,
	assertU64,
} from "@referral-split/sdk";

// =============================================================================
// Types
// =============================================================================

export interface Transfer {
	destination: Address;
	/** Subunits, always > 0 */
	amount: bigint;
}

export interface BalanceLedger {
	getBalance(account: Address): bigint;
	/**
	 * Move every transfer out of `source`, or throw and move nothing.
	 * Must not yield between reading `source` and writing balances.
	 */
	transferBatch(source: Address, transfers: readonly Transfer[]): void;
}

// =============================================================================
// In-Memory Ledger
// =============================================================================

/**
 * Map-backed ledger. Unknown accounts hold zero.
 *
 * @example
 * ```typescript
 * const ledger = new InMemoryLedger([[payer, 2_000_000_000n]]);
 * ledger.transferBatch(payer, [{ destination: treasury, amount: 500_000_000n }]);
 * ledger.getBalance(payer); // 1_500_000_000n
 * ```
 */
export class InMemoryLedger implements BalanceLedger {
	private readonly balances = new Map<Address, bigint>();

	constructor(initial: Iterable<readonly [Address, bigint]> = []) {
		for (const [account, balance] of initial) {
			assertU64(balance, `Balance of ${account}`);
			this.balances.set(account, balance);
		}
	}

	getBalance(account: Address): bigint {
		return this.balances.get(account) ?? 0n;
	}

	/** Credit an account outside of any settlement (airdrop, test setup) */
	fund(account: Address, amount: bigint): void {
		const next = this.getBalance(account) + amount;
		if (amount < 0n || next > U64_MAX) {
			throw new ArithmeticOverflowError(next, `Balance of ${account}`);
		}
		this.balances.set(account, next);
	}

	transferBatch(source: Address, transfers: readonly Transfer[]): void {
		if (transfers.length === 0) return;

		let required = 0n;
		for (const { destination, amount } of transfers) {
			if (!isAddress(destination)) {
				throw new AccountShapeError(
					`Invalid transfer destination: ${destination}`,
				);
			}
			assertU64(amount, "Transfer amount");
			required += amount;
		}

		const available = this.getBalance(source);
		if (available < required) {
			throw new InsufficientBalanceError(source, required, available);
		}

		// Stage every new balance before committing any of them
		const staged = new Map<Address, bigint>([[source, available - required]]);
		for (const { destination, amount } of transfers) {
			const current = staged.get(destination) ?? this.getBalance(destination);
			const next = current + amount;
			if (next > U64_MAX) {
				throw new ArithmeticOverflowError(next, `Balance of ${destination}`);
			}
			staged.set(destination, next);
		}

		for (const [account, balance] of staged) {
			this.balances.set(account, balance);
		}
	}

	/** Copy of all non-default balances */
	snapshot(): Map<Address, bigint> {
		return new Map(this.balances);
	}
}
