/**
 * Tests for the instruction builder and high-level client
 */

import { describe, it, expect, vi } from "vitest";
import { AccountRole } from "@solana/kit";
import { buildDistributionInstruction } from "../src/instructions.js";
import {
	createDistributorClient,
	createPaymentDistribution,
} from "../src/client.js";
import { decodePaymentRequest } from "../src/codec.js";
import { PROGRAM_ID, SYSTEM_PROGRAM_ADDRESS } from "../src/constants.js";
import type { ReferrerResponse } from "../src/referrals.js";
import { SOL, TEST_ADDRESSES, TEST_CONFIG } from "./fixtures.js";

const { payer, treasury, team, firstReferrer, secondReferrer } =
	TEST_ADDRESSES;

function chainLookup() {
	const responses: Record<string, ReferrerResponse> = {
		FRIEND42: { success: true, referrerWallet: firstReferrer },
		[firstReferrer]: { success: true, referrerWallet: secondReferrer },
	};
	return {
		getReferrer: vi.fn(
			async (key: string): Promise<ReferrerResponse> =>
				responses[key] ?? { success: false },
		),
	};
}

describe("buildDistributionInstruction", () => {
	it("targets the configured program", () => {
		const { instruction } = buildDistributionInstruction({
			config: TEST_CONFIG,
			payer,
			grossAmount: SOL,
		});
		expect(instruction.programAddress).toBe(PROGRAM_ID);
	});

	it("fills absent referrer slots with the payer and clears the flags", () => {
		const { instruction, request } = buildDistributionInstruction({
			config: TEST_CONFIG,
			payer,
			grossAmount: SOL,
		});

		expect(request).toEqual({
			grossAmount: SOL,
			hasFirstReferrer: false,
			hasSecondReferrer: false,
		});
		expect(instruction.accounts?.map((meta) => meta.address)).toEqual([
			payer,
			treasury,
			team,
			payer,
			payer,
			SYSTEM_PROGRAM_ADDRESS,
		]);
		expect(decodePaymentRequest(instruction.data)).toEqual(request);
	});

	it("sets only the first flag for a single referrer", () => {
		const { instruction, request } = buildDistributionInstruction({
			config: TEST_CONFIG,
			payer,
			grossAmount: 2n * SOL,
			referrers: { kind: "first", first: firstReferrer },
		});

		expect(request.hasFirstReferrer).toBe(true);
		expect(request.hasSecondReferrer).toBe(false);
		expect(instruction.accounts?.[3]?.address).toBe(firstReferrer);
		expect(instruction.accounts?.[4]?.address).toBe(payer);
	});

	it("marks only the payer as signer", () => {
		const { instruction } = buildDistributionInstruction({
			config: TEST_CONFIG,
			payer,
			grossAmount: SOL,
			referrers: { kind: "both", first: firstReferrer, second: secondReferrer },
		});

		expect(instruction.accounts?.map((meta) => meta.role)).toEqual([
			AccountRole.WRITABLE_SIGNER,
			AccountRole.WRITABLE,
			AccountRole.WRITABLE,
			AccountRole.WRITABLE,
			AccountRole.WRITABLE,
			AccountRole.READONLY,
		]);
	});
});

describe("createPaymentDistribution", () => {
	it("resolves a referral code into both tiers", async () => {
		const lookup = chainLookup();

		const result = await createPaymentDistribution(
			{ amount: 1, payer, referralCode: "FRIEND42" },
			{ config: TEST_CONFIG, lookup },
		);

		expect(result.referrers).toEqual({
			kind: "both",
			first: firstReferrer,
			second: secondReferrer,
		});
		expect(result.warnings).toEqual([]);
		expect(decodePaymentRequest(result.instruction.data)).toEqual({
			grossAmount: SOL,
			hasFirstReferrer: true,
			hasSecondReferrer: true,
		});
		expect(result.preview).toEqual([
			{ role: "treasury", amount: 500_000_000n },
			{ role: "team", amount: 250_000_000n },
			{ role: "first", amount: 200_000_000n },
			{ role: "second", amount: 50_000_000n },
		]);
	});

	it("floors fractional subunits", async () => {
		const result = await createPaymentDistribution(
			{ amount: "0.0000000015", payer },
			{ config: TEST_CONFIG },
		);
		expect(result.request.grossAmount).toBe(1n);
	});

	it("builds without referrers when the lookup fails", async () => {
		const lookup = {
			getReferrer: vi.fn(async (): Promise<ReferrerResponse> => {
				throw new Error("service down");
			}),
		};
		const onWarning = vi.fn();

		const result = await createPaymentDistribution(
			{ amount: 1, payer, referralCode: "FRIEND42" },
			{ config: TEST_CONFIG, lookup, onWarning },
		);

		expect(result.referrers).toEqual({ kind: "none" });
		expect(result.request.hasFirstReferrer).toBe(false);
		expect(result.instruction.accounts?.[3]?.address).toBe(payer);
		expect(onWarning).toHaveBeenCalledTimes(1);
		expect(onWarning).toHaveBeenCalledWith(
			expect.objectContaining({
				tier: "first",
				reason: "lookup_failed",
				message: "First-tier referrer lookup failed: service down",
			}),
		);
	});

	it("warns when a code is given without a lookup service", async () => {
		const result = await createPaymentDistribution(
			{ amount: 1, payer, referralCode: "FRIEND42" },
			{ config: TEST_CONFIG },
		);

		expect(result.referrers).toEqual({ kind: "none" });
		expect(result.warnings).toEqual([
			{
				tier: "first",
				reason: "lookup_failed",
				message: "Referral code ignored: no referral lookup configured",
			},
		]);
	});

	it("does not call the lookup for a blank code", async () => {
		const lookup = chainLookup();

		const result = await createPaymentDistribution(
			{ amount: 1, payer, referralCode: "  " },
			{ config: TEST_CONFIG, lookup },
		);

		expect(lookup.getReferrer).not.toHaveBeenCalled();
		expect(result.warnings).toEqual([]);
	});

	it("rejects an invalid payer address", async () => {
		await expect(
			createPaymentDistribution(
				{ amount: 1, payer: "not-an-address" },
				{ config: TEST_CONFIG },
			),
		).rejects.toThrow();
	});

	it("rejects an invalid amount", async () => {
		await expect(
			createPaymentDistribution(
				{ amount: -1, payer },
				{ config: TEST_CONFIG },
			),
		).rejects.toThrow("Invalid payment amount: -1");
	});
});

describe("createDistributorClient", () => {
	it("quotes an allocation without building", () => {
		const client = createDistributorClient({ config: TEST_CONFIG });

		expect(client.quote("10", { hasFirstReferrer: true })).toEqual([
			{ role: "treasury", amount: 5_000_000_000n },
			{ role: "team", amount: 4_800_000_000n },
			{ role: "first", amount: 200_000_000n },
			{ role: "second", amount: 0n },
		]);
	});

	it("builds with the bound lookup and warning handler", async () => {
		const lookup = chainLookup();
		const onWarning = vi.fn();
		const client = createDistributorClient({
			config: TEST_CONFIG,
			lookup,
			onWarning,
		});

		const { referrers } = await client.build({
			amount: "0.5",
			payer,
			referralCode: "FRIEND42",
		});

		expect(referrers.kind).toBe("both");
		expect(onWarning).not.toHaveBeenCalled();
		expect(lookup.getReferrer).toHaveBeenCalledTimes(2);
	});
});
