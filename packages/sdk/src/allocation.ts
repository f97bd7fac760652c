/**
 * Allocation rules for a referral payment.
 *
 * Integer-only: every share is floored, and the team wallet receives the
 * residual. That residual absorbs an absent referrer's share, anything above
 * a referrer cap, and all rounding remainders, so the four amounts always sum
 * to the gross amount.
 */

import {
	FIRST_REFERRER_PERCENT,
	PERCENT_DENOMINATOR,
	SECOND_REFERRER_PERCENT,
} from "./constants.js";
import { assertU64 } from "./amounts.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Decoded instruction payload. Wallet addresses travel in the account list.
 */
export interface PaymentRequest {
	/** Gross amount in subunits */
	grossAmount: bigint;
	hasFirstReferrer: boolean;
	hasSecondReferrer: boolean;
}

/**
 * Absolute per-tier caps in subunits. Validated once by `createDistributorConfig`.
 */
export interface ReferralCaps {
	first: bigint;
	second: bigint;
}

export interface Allocation {
	treasury: bigint;
	team: bigint;
	first: bigint;
	second: bigint;
}

export type AllocationRole = keyof Allocation;

export interface AllocationLine {
	role: AllocationRole;
	amount: bigint;
}

// =============================================================================
// Allocation
// =============================================================================

/**
 * Split a gross amount between treasury, team and up to two referrers.
 *
 * Throws `ArithmeticOverflowError` when `grossAmount` is outside u64.
 *
 * @example
 * ```typescript
 * allocate(
 *   { grossAmount: 10_000_000_000n, hasFirstReferrer: true, hasSecondReferrer: true },
 *   { first: 200_000_000n, second: 50_000_000n },
 * );
 * // { treasury: 5_000_000_000n, team: 4_750_000_000n, first: 200_000_000n, second: 50_000_000n }
 * ```
 */
export function allocate(
	request: PaymentRequest,
	caps: ReferralCaps,
): Allocation {
	const { grossAmount, hasFirstReferrer, hasSecondReferrer } = request;
	assertU64(grossAmount, "Gross amount");

	const treasury = grossAmount / 2n;
	const first = hasFirstReferrer
		? min(percentOf(grossAmount, FIRST_REFERRER_PERCENT), caps.first)
		: 0n;
	const second = hasSecondReferrer
		? min(percentOf(grossAmount, SECOND_REFERRER_PERCENT), caps.second)
		: 0n;
	const team = grossAmount - treasury - first - second;

	return { treasury, team, first, second };
}

/**
 * Allocation as ordered lines, in the order transfers are applied.
 */
export function previewAllocation(
	request: PaymentRequest,
	caps: ReferralCaps,
): AllocationLine[] {
	const allocation = allocate(request, caps);
	return ALLOCATION_ORDER.map((role) => ({ role, amount: allocation[role] }));
}

/** Transfer order: treasury, team, first-tier, second-tier */
export const ALLOCATION_ORDER: readonly AllocationRole[] = [
	"treasury",
	"team",
	"first",
	"second",
];

// bigint has no fixed width, so the product cannot wrap
function percentOf(amount: bigint, percent: bigint): bigint {
	return (amount * percent) / PERCENT_DENOMINATOR;
}

function min(a: bigint, b: bigint): bigint {
	return a < b ? a : b;
}
