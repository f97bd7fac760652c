/**
 * SDK Constants
 *
 * Distribution rules and layout sizes shared by the builder and the engine.
 * Internal files should import from here to avoid circular dependencies with index.ts.
 */

import { type Address, address } from "@solana/kit";

// =============================================================================
// Program Constants
// =============================================================================

/** Default program ID of the payment distributor */
export const PROGRAM_ID: Address = address(
	"7uzdFazbJCtoiRiRjbzbjRcJUDkKw4Q5mhaAz4SJcea1",
);

/** Native System Program (inlined to avoid @solana-program/* dependencies) */
export const SYSTEM_PROGRAM_ADDRESS: Address = address(
	"11111111111111111111111111111111",
);

// =============================================================================
// Units
// =============================================================================

/** Subunits (lamports) per whole unit (SOL) */
export const SUBUNITS_PER_UNIT = 1_000_000_000n;

/** Decimal places of a whole unit */
export const UNIT_DECIMALS = 9;

/** Largest amount the wire format and ledger can carry (u64) */
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

// =============================================================================
// Distribution Rules
// =============================================================================

export const PERCENT_DENOMINATOR = 100n;

/** First-tier referrer share before capping */
export const FIRST_REFERRER_PERCENT = 20n;

/** Second-tier referrer share before capping */
export const SECOND_REFERRER_PERCENT = 5n;

/** Default first-tier cap: 0.2 whole units */
export const DEFAULT_FIRST_REFERRER_CAP = 200_000_000n;

/** Default second-tier cap: 0.05 whole units */
export const DEFAULT_SECOND_REFERRER_CAP = 50_000_000n;

// =============================================================================
// Wire Layout
// =============================================================================

export const U64_SIZE = 8;
export const FLAG_SIZE = 1;

/** grossAmount (u64 LE) + hasFirstReferrer (u8) + hasSecondReferrer (u8) */
export const PAYMENT_REQUEST_SIZE = U64_SIZE + FLAG_SIZE + FLAG_SIZE;

/** Payer, treasury, team, two referrer slots, system program */
export const ACCOUNT_LIST_LENGTH = 6;

/**
 * Positions in the distribution account list.
 * Decoding is positional, never by name.
 */
export const ACCOUNT_SLOTS = {
	PAYER: 0,
	TREASURY: 1,
	TEAM: 2,
	FIRST_REFERRER: 3,
	SECOND_REFERRER: 4,
	SYSTEM_PROGRAM: 5,
} as const;

export type AccountSlotName = keyof typeof ACCOUNT_SLOTS;
