/**
 * Instruction builder for payment distribution
 *
 * Combines the 10-byte payload and the six-slot account list into a
 * `@solana/kit` Instruction addressed to the distributor program.
 */

import type { Address, Instruction } from "@solana/kit";
import type { PaymentRequest } from "./allocation.js";
import { encodePaymentRequest } from "./codec.js";
import type { DistributorConfig } from "./config.js";
import { getDistributionAccountMetas } from "./layout.js";
import { type ReferralChain, referralSlots } from "./referrals.js";

/**
 * Result of buildDistributionInstruction
 */
export interface DistributionInstructionResult {
	instruction: Instruction;
	/** The request encoded in `instruction.data` */
	request: PaymentRequest;
}

/**
 * Build the distribution instruction for an amount already in subunits.
 *
 * Referral flags are derived from the chain, so a flag is set exactly when
 * its slot carries a real referrer.
 *
 * @example
 * ```typescript
 * const { instruction } = buildDistributionInstruction({
 *   config,
 *   payer: wallet.address,
 *   grossAmount: 1_000_000_000n,
 *   referrers: { kind: "first", first: referrer },
 * });
 * ```
 */
export function buildDistributionInstruction(params: {
	config: DistributorConfig;
	/** Paying wallet (signs the transaction) */
	payer: Address;
	/** Gross amount in subunits */
	grossAmount: bigint;
	/** Resolved referrers (defaults to none) */
	referrers?: ReferralChain;
}): DistributionInstructionResult {
	const { config, payer, grossAmount } = params;
	const { firstReferrer, secondReferrer } = referralSlots(
		params.referrers ?? { kind: "none" },
	);

	const request: PaymentRequest = {
		grossAmount,
		hasFirstReferrer: firstReferrer !== null,
		hasSecondReferrer: secondReferrer !== null,
	};

	const instruction: Instruction = {
		programAddress: config.programId,
		accounts: getDistributionAccountMetas({
			payer,
			treasury: config.treasury,
			team: config.team,
			firstReferrer,
			secondReferrer,
		}),
		data: encodePaymentRequest(request),
	};

	return { instruction, request };
}
