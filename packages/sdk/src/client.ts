/**
 * High-level builder client
 *
 * Takes a whole-unit amount, a payer and an optional referral code, and
 * always returns a valid instruction. Referral problems come back as warnings.
 */

import { type Address, type Instruction, address } from "@solana/kit";
import {
	type AllocationLine,
	type PaymentRequest,
	previewAllocation,
} from "./allocation.js";
import { toSubunits } from "./amounts.js";
import type { DistributorConfig } from "./config.js";
import { buildDistributionInstruction } from "./instructions.js";
import {
	type ReferralChain,
	type ReferralLookupService,
	type ReferralWarning,
	resolveReferrers,
} from "./referrals.js";

// =============================================================================
// Types
// =============================================================================

export interface PaymentDistributionParams {
	/** Amount in whole units (SOL); floored to subunits */
	amount: number | string;
	/** Paying wallet address */
	payer: Address | string;
	/** Referral code to resolve (optional) */
	referralCode?: string;
}

export interface PaymentDistributionOptions {
	config: DistributorConfig;
	/** Required only when a referral code is given */
	lookup?: ReferralLookupService;
	signal?: AbortSignal;
	/** Called once per referral warning, in addition to `warnings` */
	onWarning?: (warning: ReferralWarning) => void;
}

export interface PaymentDistribution {
	instruction: Instruction;
	request: PaymentRequest;
	referrers: ReferralChain;
	/** What each party receives if the engine settles this instruction */
	preview: AllocationLine[];
	warnings: ReferralWarning[];
}

export interface QuoteFlags {
	hasFirstReferrer?: boolean;
	hasSecondReferrer?: boolean;
}

// =============================================================================
// Direct Function
// =============================================================================

/**
 * Resolve referrers and build the distribution instruction.
 *
 * @example
 * ```typescript
 * const { instruction, warnings } = await createPaymentDistribution(
 *   { amount: 1.5, payer: wallet.address, referralCode: "FRIEND42" },
 *   { config, lookup: createHttpReferralLookup({ baseUrl }) },
 * );
 * ```
 */
export async function createPaymentDistribution(
	params: PaymentDistributionParams,
	options: PaymentDistributionOptions,
): Promise<PaymentDistribution> {
	const { config, lookup, signal, onWarning } = options;
	const payer = address(params.payer);
	const grossAmount = toSubunits(params.amount);

	let referrers: ReferralChain = { kind: "none" };
	const warnings: ReferralWarning[] = [];

	if (params.referralCode?.trim()) {
		if (lookup) {
			const resolved = await resolveReferrers(params.referralCode, lookup, {
				signal,
			});
			referrers = resolved.chain;
			warnings.push(...resolved.warnings);
		} else {
			warnings.push({
				tier: "first",
				reason: "lookup_failed",
				message: "Referral code ignored: no referral lookup configured",
			});
		}
	}

	for (const warning of warnings) {
		onWarning?.(warning);
	}

	const { instruction, request } = buildDistributionInstruction({
		config,
		payer,
		grossAmount,
		referrers,
	});

	return {
		instruction,
		request,
		referrers,
		preview: previewAllocation(request, config.caps),
		warnings,
	};
}

// =============================================================================
// Client Factory
// =============================================================================

export interface DistributorClient {
	readonly config: DistributorConfig;
	/** Build an instruction (see `createPaymentDistribution`) */
	build(
		params: PaymentDistributionParams,
		options?: { signal?: AbortSignal },
	): Promise<PaymentDistribution>;
	/** Allocation for a whole-unit amount, without building anything */
	quote(amount: number | string, flags?: QuoteFlags): AllocationLine[];
}

/**
 * Create a builder client bound to one configuration and lookup service.
 *
 * @example
 * ```typescript
 * const distributor = createDistributorClient({
 *   config: loadDistributorConfig(process.env),
 *   lookup: createHttpReferralLookup({ baseUrl: process.env.REFERRAL_API_URL }),
 * });
 * const { instruction } = await distributor.build({ amount: 1, payer });
 * ```
 */
export function createDistributorClient(options: {
	config: DistributorConfig;
	lookup?: ReferralLookupService;
	onWarning?: (warning: ReferralWarning) => void;
}): DistributorClient {
	const { config, lookup, onWarning } = options;

	return {
		config,
		build: (params, { signal } = {}) =>
			createPaymentDistribution(params, { config, lookup, signal, onWarning }),
		quote: (amount, flags = {}) =>
			previewAllocation(
				{
					grossAmount: toSubunits(amount),
					hasFirstReferrer: flags.hasFirstReferrer ?? false,
					hasSecondReferrer: flags.hasSecondReferrer ?? false,
				},
				config.caps,
			),
	};
}
