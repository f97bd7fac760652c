/**
 * Tests for the in-memory balance ledger
 */

import { describe, it, expect } from "vitest";
import {
	ArithmeticOverflowError,
	InsufficientBalanceError,
	U64_MAX,
} from "@referral-split/sdk";
import { InMemoryLedger } from "../src/ledger.js";
import { SOL, TEST_ADDRESSES } from "./fixtures.js";

const { payer, treasury, team } = TEST_ADDRESSES;

describe("InMemoryLedger", () => {
	it("reports zero for unknown accounts", () => {
		expect(new InMemoryLedger().getBalance(payer)).toBe(0n);
	});

	it("rejects initial balances outside u64", () => {
		expect(() => new InMemoryLedger([[payer, -1n]])).toThrow(
			ArithmeticOverflowError,
		);
	});

	it("funds accounts", () => {
		const ledger = new InMemoryLedger([[payer, 1n]]);
		ledger.fund(payer, 2n);
		expect(ledger.getBalance(payer)).toBe(3n);
		expect(() => ledger.fund(payer, U64_MAX)).toThrow(ArithmeticOverflowError);
		expect(ledger.getBalance(payer)).toBe(3n);
	});

	describe("transferBatch", () => {
		it("moves every transfer out of the source", () => {
			const ledger = new InMemoryLedger([[payer, 2n * SOL]]);

			ledger.transferBatch(payer, [
				{ destination: treasury, amount: 500_000_000n },
				{ destination: team, amount: 300_000_000n },
			]);

			expect(ledger.getBalance(payer)).toBe(1_200_000_000n);
			expect(ledger.getBalance(treasury)).toBe(500_000_000n);
			expect(ledger.getBalance(team)).toBe(300_000_000n);
		});

		it("credits repeated destinations once per transfer", () => {
			const ledger = new InMemoryLedger([[payer, 10n]]);

			ledger.transferBatch(payer, [
				{ destination: team, amount: 3n },
				{ destination: team, amount: 4n },
			]);

			expect(ledger.getBalance(team)).toBe(7n);
			expect(ledger.getBalance(payer)).toBe(3n);
		});

		it("nets out a transfer back to the source", () => {
			const ledger = new InMemoryLedger([[payer, 10n]]);

			ledger.transferBatch(payer, [
				{ destination: treasury, amount: 4n },
				{ destination: payer, amount: 5n },
			]);

			expect(ledger.getBalance(payer)).toBe(6n);
			expect(ledger.getBalance(treasury)).toBe(4n);
		});

		it("moves nothing when the source is short", () => {
			const ledger = new InMemoryLedger([[payer, 2n]]);

			expect(() =>
				ledger.transferBatch(payer, [
					{ destination: treasury, amount: 2n },
					{ destination: team, amount: 1n },
				]),
			).toThrow(
				new InsufficientBalanceError(payer, 3n, 2n),
			);
			expect(ledger.snapshot()).toEqual(new Map([[payer, 2n]]));
		});

		it("moves nothing when a destination would overflow", () => {
			const ledger = new InMemoryLedger([
				[payer, 10n],
				[team, U64_MAX],
			]);

			expect(() =>
				ledger.transferBatch(payer, [
					{ destination: treasury, amount: 1n },
					{ destination: team, amount: 1n },
				]),
			).toThrow(ArithmeticOverflowError);
			expect(ledger.getBalance(payer)).toBe(10n);
			expect(ledger.getBalance(treasury)).toBe(0n);
		});

		it("does not record the source for an empty batch", () => {
			const ledger = new InMemoryLedger();

			ledger.transferBatch(payer, []);

			expect(ledger.snapshot()).toEqual(new Map());
		});

		it("rejects negative amounts", () => {
			const ledger = new InMemoryLedger([[payer, 10n]]);
			expect(() =>
				ledger.transferBatch(payer, [{ destination: team, amount: -1n }]),
			).toThrow("Transfer amount out of u64 range: -1");
		});
	});
});
