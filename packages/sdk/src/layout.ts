/**
 * Distribution account layout.
 *
 * The account list is always six entries in a fixed order. An absent referrer
 * is represented on the wire by repeating the payer address in its slot; that
 * convention lives only in this file. Everything past the boundary works with
 * `DistributionAccounts`, where an absent referrer is `null`.
 */

import {
	type AccountMeta,
	type Address,
	AccountRole,
	isAddress,
	isSignerRole,
	isWritableRole,
} from "@solana/kit";
import type { PaymentRequest } from "./allocation.js";
import {
	ACCOUNT_LIST_LENGTH,
	ACCOUNT_SLOTS,
	type AccountSlotName,
	SYSTEM_PROGRAM_ADDRESS,
} from "./constants.js";
import { AccountShapeError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Typed view of the six-slot account list.
 */
export interface DistributionAccounts {
	payer: Address;
	treasury: Address;
	team: Address;
	/** `null` when the request carries no first-tier referrer */
	firstReferrer: Address | null;
	/** `null` when the request carries no second-tier referrer */
	secondReferrer: Address | null;
}

/**
 * Addresses the engine trusts for the fixed slots.
 */
export interface ExpectedAccounts {
	treasury: Address;
	team: Address;
}

// =============================================================================
// Encode
// =============================================================================

/**
 * Assemble the account list for a distribution instruction.
 *
 * Referrer slots are writable whether or not a referrer is present.
 */
export function getDistributionAccountMetas(
	accounts: DistributionAccounts,
): AccountMeta[] {
	const { payer, treasury, team, firstReferrer, secondReferrer } = accounts;
	return [
		{ address: payer, role: AccountRole.WRITABLE_SIGNER },
		{ address: treasury, role: AccountRole.WRITABLE },
		{ address: team, role: AccountRole.WRITABLE },
		{ address: firstReferrer ?? payer, role: AccountRole.WRITABLE },
		{ address: secondReferrer ?? payer, role: AccountRole.WRITABLE },
		{ address: SYSTEM_PROGRAM_ADDRESS, role: AccountRole.READONLY },
	];
}

// =============================================================================
// Decode
// =============================================================================

/**
 * Validate an account list against the fixed shape and decode it.
 *
 * Referrer slots are taken as given when their flag is set and ignored
 * otherwise. Throws `AccountShapeError` naming the offending slot.
 */
export function parseDistributionAccounts(
	accounts: readonly AccountMeta[] | undefined,
	request: PaymentRequest,
	expected: ExpectedAccounts,
): DistributionAccounts {
	if (!accounts || accounts.length !== ACCOUNT_LIST_LENGTH) {
		throw new AccountShapeError(
			`Expected ${ACCOUNT_LIST_LENGTH} accounts, got ${accounts?.length ?? 0}`,
		);
	}

	const payer = slot(accounts, "PAYER");
	if (!isSignerRole(payer.role)) {
		throw new AccountShapeError("Payer must sign the transaction", "PAYER");
	}
	requireWritable(payer, "PAYER");
	requireValidAddress(payer, "PAYER");

	const treasury = slot(accounts, "TREASURY");
	requireAddress(treasury, expected.treasury, "TREASURY");
	requireWritable(treasury, "TREASURY");

	const team = slot(accounts, "TEAM");
	requireAddress(team, expected.team, "TEAM");
	requireWritable(team, "TEAM");

	const first = slot(accounts, "FIRST_REFERRER");
	requireWritable(first, "FIRST_REFERRER");
	requireValidAddress(first, "FIRST_REFERRER");

	const second = slot(accounts, "SECOND_REFERRER");
	requireWritable(second, "SECOND_REFERRER");
	requireValidAddress(second, "SECOND_REFERRER");

	requireAddress(
		slot(accounts, "SYSTEM_PROGRAM"),
		SYSTEM_PROGRAM_ADDRESS,
		"SYSTEM_PROGRAM",
	);

	return {
		payer: payer.address,
		treasury: treasury.address,
		team: team.address,
		firstReferrer: request.hasFirstReferrer ? first.address : null,
		secondReferrer: request.hasSecondReferrer ? second.address : null,
	};
}

// =============================================================================
// Helpers
// =============================================================================

function slot(accounts: readonly AccountMeta[], name: AccountSlotName): AccountMeta {
	const meta = accounts[ACCOUNT_SLOTS[name]];
	if (!meta) {
		throw new AccountShapeError(`Missing ${name} account`, name);
	}
	return meta;
}

function requireWritable(meta: AccountMeta, name: AccountSlotName): void {
	if (!isWritableRole(meta.role)) {
		throw new AccountShapeError(`${name} account must be writable`, name);
	}
}

function requireValidAddress(meta: AccountMeta, name: AccountSlotName): void {
	if (!isAddress(meta.address)) {
		throw new AccountShapeError(
			`${name} account is not a valid address: ${meta.address}`,
			name,
		);
	}
}

function requireAddress(
	meta: AccountMeta,
	expected: Address,
	name: AccountSlotName,
): void {
	if (meta.address !== expected) {
		throw new AccountShapeError(
			`${name} account mismatch: expected ${expected}, got ${meta.address}`,
			name,
		);
	}
}
