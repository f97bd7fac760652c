/**
 * Tests for whole-unit / subunit conversion
 */

import { describe, it, expect } from "vitest";
import { assertU64, formatSubunits, toSubunits } from "../src/amounts.js";
import { U64_MAX } from "../src/constants.js";
import {
	ArithmeticOverflowError,
	InvalidAmountError,
} from "../src/errors.js";

describe("toSubunits", () => {
	it("converts whole units to subunits", () => {
		expect(toSubunits(1)).toBe(1_000_000_000n);
		expect(toSubunits(1.5)).toBe(1_500_000_000n);
		expect(toSubunits("2")).toBe(2_000_000_000n);
		expect(toSubunits(0)).toBe(0n);
	});

	it("reads decimal text exactly", () => {
		expect(toSubunits("1.005")).toBe(1_005_000_000n);
		expect(toSubunits(0.1)).toBe(100_000_000n);
		expect(toSubunits(".5")).toBe(500_000_000n);
		expect(toSubunits("5.")).toBe(5_000_000_000n);
		expect(toSubunits(" 2 ")).toBe(2_000_000_000n);
	});

	it("floors digits past the ninth decimal place", () => {
		expect(toSubunits("0.0000000019")).toBe(1n);
		expect(toSubunits("0.0000000009")).toBe(0n);
		expect(toSubunits("1e-10")).toBe(0n);
	});

	it("handles exponent notation", () => {
		expect(toSubunits(1e-7)).toBe(100n);
		expect(toSubunits("2.5e3")).toBe(2_500_000_000_000n);
	});

	it("accepts the largest u64 amount", () => {
		expect(toSubunits("18446744073.709551615")).toBe(U64_MAX);
	});

	it("rejects amounts above u64", () => {
		expect(() => toSubunits("18446744073.709551616")).toThrow(
			"Payment amount out of u64 range: 18446744073709551616",
		);
		expect(() => toSubunits("1e400")).toThrow(ArithmeticOverflowError);
	});

	it("rejects negative and non-numeric input", () => {
		expect(() => toSubunits(-1)).toThrow("Invalid payment amount: -1");
		expect(() => toSubunits("-1")).toThrow(InvalidAmountError);
		expect(() => toSubunits(Number.NaN)).toThrow(
			"Invalid payment amount: NaN",
		);
		expect(() => toSubunits(Number.POSITIVE_INFINITY)).toThrow(
			InvalidAmountError,
		);
		expect(() => toSubunits("abc")).toThrow("Invalid payment amount: abc");
		expect(() => toSubunits("")).toThrow(InvalidAmountError);
		expect(() => toSubunits(".")).toThrow(InvalidAmountError);
	});
});

describe("formatSubunits", () => {
	it("strips trailing zeros", () => {
		expect(formatSubunits(1_500_000_000n)).toBe("1.5");
		expect(formatSubunits(2_000_000_000n)).toBe("2");
		expect(formatSubunits(0n)).toBe("0");
	});

	it("keeps leading fractional zeros", () => {
		expect(formatSubunits(1n)).toBe("0.000000001");
		expect(formatSubunits(50_000_000n)).toBe("0.05");
	});

	it("formats negative amounts", () => {
		expect(formatSubunits(-500_000_000n)).toBe("-0.5");
	});
});

describe("assertU64", () => {
	it("accepts the u64 range", () => {
		expect(() => assertU64(0n, "x")).not.toThrow();
		expect(() => assertU64(U64_MAX, "x")).not.toThrow();
	});

	it("rejects values outside u64", () => {
		expect(() => assertU64(-1n, "Amount")).toThrow(
			"Amount out of u64 range: -1",
		);
		expect(() => assertU64(U64_MAX + 1n, "Amount")).toThrow(
			ArithmeticOverflowError,
		);
	});
});
