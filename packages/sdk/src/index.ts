/**
 * Referral Split SDK
 *
 * Allocation rules, wire layout and instruction builder for referral payment
 * distribution on Solana. All exports from a single entry point.
 *
 * @example
 * ```typescript
 * import {
 *   createDistributorClient,
 *   createHttpReferralLookup,
 *   loadDistributorConfig,
 * } from '@referral-split/sdk';
 *
 * const distributor = createDistributorClient({
 *   config: loadDistributorConfig(process.env),
 *   lookup: createHttpReferralLookup({ baseUrl: "https://example.com/api/referrals" }),
 * });
 *
 * const { instruction, preview, warnings } = await distributor.build({
 *   amount: 1.5,
 *   payer: "9xQeWvG816bUx9EPjHmaT23yvVM2ZWbrrpZb9PusVFin",
 *   referralCode: "FRIEND42",
 * });
 * ```
 */

// =============================================================================
// Constants
// =============================================================================

export {
	PROGRAM_ID,
	SYSTEM_PROGRAM_ADDRESS,
	SUBUNITS_PER_UNIT,
	U64_MAX,
	FIRST_REFERRER_PERCENT,
	SECOND_REFERRER_PERCENT,
	DEFAULT_FIRST_REFERRER_CAP,
	DEFAULT_SECOND_REFERRER_CAP,
	PAYMENT_REQUEST_SIZE,
	ACCOUNT_LIST_LENGTH,
	ACCOUNT_SLOTS,
	type AccountSlotName,
} from "./constants.js";

// =============================================================================
// Errors
// =============================================================================

export * from "./errors.js";

// =============================================================================
// Allocation & Amounts
// =============================================================================

export {
	allocate,
	previewAllocation,
	ALLOCATION_ORDER,
	type Allocation,
	type AllocationLine,
	type AllocationRole,
	type PaymentRequest,
	type ReferralCaps,
} from "./allocation.js";

export { toSubunits, formatSubunits, assertU64 } from "./amounts.js";

// =============================================================================
// Configuration
// =============================================================================

export {
	createDistributorConfig,
	loadDistributorConfig,
	formatZodError,
	DistributorConfigSchema,
	type DistributorConfig,
	type DistributorConfigInput,
	type DistributorEnv,
} from "./config.js";

// =============================================================================
// Wire Format (shared by builder and engine)
// =============================================================================

export { encodePaymentRequest, decodePaymentRequest } from "./codec.js";

export {
	getDistributionAccountMetas,
	parseDistributionAccounts,
	type DistributionAccounts,
	type ExpectedAccounts,
} from "./layout.js";

// =============================================================================
// Referrals
// =============================================================================

export {
	resolveReferrers,
	referralSlots,
	createHttpReferralLookup,
	ReferrerResponseSchema,
	type ReferrerResponse,
	type ReferralLookupService,
	type ReferralChain,
	type ReferralTier,
	type ReferralWarning,
	type ReferralWarningReason,
	type ResolvedReferrers,
	type HttpReferralLookupOptions,
} from "./referrals.js";

// =============================================================================
// Instructions & Client
// =============================================================================

export {
	buildDistributionInstruction,
	type DistributionInstructionResult,
} from "./instructions.js";

export {
	createPaymentDistribution,
	createDistributorClient,
	type DistributorClient,
	type PaymentDistribution,
	type PaymentDistributionParams,
	type PaymentDistributionOptions,
	type QuoteFlags,
} from "./client.js";
