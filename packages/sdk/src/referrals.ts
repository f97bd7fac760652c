/**
 * Referral resolution
 *
 * Turns a referral code into at most two referrer wallets through an external
 * lookup service. Lookups never fail a build: every failure degrades the
 * referral tier and is reported as a warning.
 */

import * as z from "zod";
import { type Address, isAddress } from "@solana/kit";
import { ReferralLookupError } from "./errors.js";
import { formatZodError } from "./config.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Lookup service response.
 */
export const ReferrerResponseSchema = z.object({
	success: z.boolean(),
	referrerWallet: z.string().optional(),
	message: z.string().optional(),
});

export type ReferrerResponse = z.infer<typeof ReferrerResponseSchema>;

/**
 * External referral lookup. `key` is a referral code for the first tier and
 * the first-tier wallet for the second tier.
 */
export interface ReferralLookupService {
	getReferrer(
		key: string,
		options?: { signal?: AbortSignal },
	): Promise<ReferrerResponse>;
}

/**
 * Resolved referrers. A second tier only exists on top of a first tier.
 */
export type ReferralChain =
	| { kind: "none" }
	| { kind: "first"; first: Address }
	| { kind: "both"; first: Address; second: Address };

export type ReferralTier = "first" | "second";

export type ReferralWarningReason =
	| "not_found"
	| "invalid_wallet"
	| "lookup_failed";

export interface ReferralWarning {
	tier: ReferralTier;
	reason: ReferralWarningReason;
	message: string;
	error?: Error;
}

export interface ResolvedReferrers {
	chain: ReferralChain;
	warnings: ReferralWarning[];
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve a referral code into a referral chain.
 *
 * The second lookup runs only after a successful first lookup, using the
 * first-tier wallet as its key. No lookup is retried.
 *
 * @example
 * ```typescript
 * const { chain, warnings } = await resolveReferrers("FRIEND42", lookup);
 * if (chain.kind !== "none") console.log("Referred by", chain.first);
 * ```
 */
export async function resolveReferrers(
	referralCode: string | undefined,
	lookup: ReferralLookupService,
	options: { signal?: AbortSignal } = {},
): Promise<ResolvedReferrers> {
	const code = referralCode?.trim();
	if (!code) {
		return { chain: { kind: "none" }, warnings: [] };
	}

	const warnings: ReferralWarning[] = [];

	const first = await lookupTier(lookup, code, "first", options.signal);
	if (first.status === "failed") {
		warnings.push(first.warning);
		return { chain: { kind: "none" }, warnings };
	}

	const second = await lookupTier(lookup, first.wallet, "second", options.signal);
	if (second.status === "failed") {
		warnings.push(second.warning);
		return { chain: { kind: "first", first: first.wallet }, warnings };
	}

	return {
		chain: { kind: "both", first: first.wallet, second: second.wallet },
		warnings,
	};
}

/**
 * Referrer wallets by slot, `null` for an absent tier.
 */
export function referralSlots(chain: ReferralChain): {
	firstReferrer: Address | null;
	secondReferrer: Address | null;
} {
	switch (chain.kind) {
		case "none":
			return { firstReferrer: null, secondReferrer: null };
		case "first":
			return { firstReferrer: chain.first, secondReferrer: null };
		case "both":
			return { firstReferrer: chain.first, secondReferrer: chain.second };
	}
}

type TierResult =
	| { status: "found"; wallet: Address }
	| { status: "failed"; warning: ReferralWarning };

async function lookupTier(
	lookup: ReferralLookupService,
	key: string,
	tier: ReferralTier,
	signal: AbortSignal | undefined,
): Promise<TierResult> {
	let response: ReferrerResponse;
	try {
		response = await lookup.getReferrer(key, { signal });
	} catch (e) {
		const error = e instanceof Error ? e : new Error(String(e));
		return {
			status: "failed",
			warning: {
				tier,
				reason: "lookup_failed",
				message: `${tierLabel(tier)} lookup failed: ${error.message}`,
				error,
			},
		};
	}

	if (!response.success || !response.referrerWallet) {
		return {
			status: "failed",
			warning: {
				tier,
				reason: "not_found",
				message: `${tierLabel(tier)} not found${response.message ? `: ${response.message}` : ""}`,
			},
		};
	}

	const wallet = response.referrerWallet;
	if (!isAddress(wallet)) {
		return {
			status: "failed",
			warning: {
				tier,
				reason: "invalid_wallet",
				message: `${tierLabel(tier)} wallet is not a valid address: ${wallet}`,
			},
		};
	}

	return { status: "found", wallet };
}

function tierLabel(tier: ReferralTier): string {
	return tier === "first" ? "First-tier referrer" : "Second-tier referrer";
}

// =============================================================================
// HTTP Lookup
// =============================================================================

export interface HttpReferralLookupOptions {
	/** Base URL of the referral service, e.g. `https://example.com/api/referrals` */
	baseUrl: string;
	/** Fetch implementation (defaults to global fetch) */
	fetch?: typeof fetch;
}

/**
 * Referral lookup backed by `GET {baseUrl}/get-referrer/{key}`.
 *
 * Network errors, non-2xx responses and malformed bodies throw
 * `ReferralLookupError`. A well-formed `{ success: false }` is returned as is.
 */
export function createHttpReferralLookup(
	options: HttpReferralLookupOptions,
): ReferralLookupService {
	const baseUrl = options.baseUrl.replace(/\/+$/, "");
	const fetchFn = options.fetch ?? fetch;

	return {
		async getReferrer(key, { signal } = {}) {
			const url = `${baseUrl}/get-referrer/${encodeURIComponent(key)}`;

			let response: Response;
			try {
				response = await fetchFn(url, {
					headers: { Accept: "application/json" },
					signal,
				});
			} catch (error) {
				throw new ReferralLookupError(
					key,
					`Referral service unreachable: ${error instanceof Error ? error.message : String(error)}`,
					{ cause: error },
				);
			}

			if (!response.ok) {
				throw new ReferralLookupError(
					key,
					`Referral service returned ${response.status} ${response.statusText}`,
				);
			}

			let body: unknown;
			try {
				body = await response.json();
			} catch (error) {
				throw new ReferralLookupError(
					key,
					"Referral service returned invalid JSON",
					{ cause: error },
				);
			}

			const parsed = ReferrerResponseSchema.safeParse(body);
			if (!parsed.success) {
				throw new ReferralLookupError(
					key,
					`Malformed referral response: ${formatZodError(parsed.error)}`,
					{ cause: parsed.error },
				);
			}
			return parsed.data;
		},
	};
}
