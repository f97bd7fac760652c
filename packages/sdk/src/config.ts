/**
 * Distributor configuration
 *
 * Treasury, team, program and caps are fixed at deployment. They are
 * validated once here and injected into the builder and the engine.
 */

import * as z from "zod";
import { type Address, isAddress } from "@solana/kit";
import type { ReferralCaps } from "./allocation.js";
import {
	DEFAULT_FIRST_REFERRER_CAP,
	DEFAULT_SECOND_REFERRER_CAP,
	PROGRAM_ID,
	U64_MAX,
} from "./constants.js";
import { toSubunits } from "./amounts.js";
import { DistributorError, InvalidConfigError } from "./errors.js";

// =============================================================================
// Schemas
// =============================================================================

const AddressSchema = z
	.custom<Address>(
		(value) => typeof value === "string" && isAddress(value),
		{ message: "Invalid Solana address" },
	)
	.meta({
		description: "Base58-encoded Solana public key",
		examples: ["9xQeWvG816bUx9EPjHmaT23yvVM2ZWbrrpZb9PusVFin"],
	});

/**
 * Cap in subunits: a bigint, a safe integer, or a string of digits.
 */
const CapSchema = z
	.union([
		z.bigint(),
		z.number().int({ message: "Cap must be a whole number of subunits" }),
		z.string().regex(/^\d+$/, "Cap must be a whole number of subunits"),
	])
	.transform((value) => BigInt(value))
	.pipe(
		z
			.bigint()
			.min(0n, "Cap must not be negative")
			.max(U64_MAX, "Cap must fit in u64"),
	);

export const DistributorConfigSchema = z
	.object({
		programId: AddressSchema.default(PROGRAM_ID),
		treasury: AddressSchema,
		team: AddressSchema,
		firstReferrerCap: CapSchema.default(DEFAULT_FIRST_REFERRER_CAP),
		secondReferrerCap: CapSchema.default(DEFAULT_SECOND_REFERRER_CAP),
	})
	.meta({
		description: "Deployment-wide distributor settings",
	});

// =============================================================================
// Types
// =============================================================================

/**
 * Raw configuration input (addresses as strings, caps in subunits).
 */
export interface DistributorConfigInput {
	programId?: string;
	treasury: string;
	team: string;
	firstReferrerCap?: bigint | number | string;
	secondReferrerCap?: bigint | number | string;
}

/**
 * Validated, immutable configuration.
 */
export interface DistributorConfig {
	readonly programId: Address;
	readonly treasury: Address;
	readonly team: Address;
	readonly caps: Readonly<ReferralCaps>;
}

/** Environment variables read by `loadDistributorConfig` */
export type DistributorEnv = Partial<
	Record<
		| "DISTRIBUTOR_PROGRAM_ID"
		| "TREASURY_WALLET"
		| "TEAM_WALLET"
		| "FIRST_REFERRER_CAP"
		| "SECOND_REFERRER_CAP",
		string
	>
>;

// =============================================================================
// Construction
// =============================================================================

/**
 * Validate configuration input. Throws `InvalidConfigError`.
 *
 * @example
 * ```typescript
 * const config = createDistributorConfig({
 *   treasury: "9xQeWvG816bUx9EPjHmaT23yvVM2ZWbrrpZb9PusVFin",
 *   team: "HN7cABqLq46Es1jh92dQQisAq662SmxELLLsHHe4YWrH",
 * });
 * config.caps.first; // 200_000_000n
 * ```
 */
export function createDistributorConfig(
	input: DistributorConfigInput,
): DistributorConfig {
	const result = DistributorConfigSchema.safeParse(input);
	if (!result.success) {
		throw new InvalidConfigError(
			`Invalid distributor config: ${formatZodError(result.error)}`,
			{ cause: result.error },
		);
	}

	const { programId, treasury, team, firstReferrerCap, secondReferrerCap } =
		result.data;
	return Object.freeze({
		programId,
		treasury,
		team,
		caps: Object.freeze({ first: firstReferrerCap, second: secondReferrerCap }),
	});
}

/**
 * Build configuration from environment variables. Caps are whole units
 * (`FIRST_REFERRER_CAP=0.2`).
 */
export function loadDistributorConfig(env: DistributorEnv): DistributorConfig {
	return createDistributorConfig({
		programId: env.DISTRIBUTOR_PROGRAM_ID || undefined,
		treasury: env.TREASURY_WALLET ?? "",
		team: env.TEAM_WALLET ?? "",
		firstReferrerCap: parseCap(env.FIRST_REFERRER_CAP, "FIRST_REFERRER_CAP"),
		secondReferrerCap: parseCap(
			env.SECOND_REFERRER_CAP,
			"SECOND_REFERRER_CAP",
		),
	});
}

function parseCap(value: string | undefined, name: string): bigint | undefined {
	if (!value) return undefined;
	try {
		return toSubunits(value);
	} catch (error) {
		if (error instanceof DistributorError) {
			throw new InvalidConfigError(`${name}: ${error.message}`, {
				cause: error,
			});
		}
		throw error;
	}
}

/**
 * Helper to format Zod errors in a user-friendly way
 */
export function formatZodError(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
			return `${path}${issue.message}`;
		})
		.join("; ");
}
