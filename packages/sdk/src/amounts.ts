/**
 * Whole-unit ↔ subunit conversion.
 *
 * Conversion works on the decimal text of the amount, so `1.005` becomes
 * exactly 1_005_000_000 subunits instead of whatever `1.005 * 1e9` rounds to.
 */

import { SUBUNITS_PER_UNIT, U64_MAX, UNIT_DECIMALS } from "./constants.js";
import { ArithmeticOverflowError, InvalidAmountError } from "./errors.js";

const DECIMAL_PATTERN = /^(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const MAX_U64_DIGITS = U64_MAX.toString().length;

/**
 * Throw unless `value` fits an unsigned 64-bit integer.
 */
export function assertU64(value: bigint, context: string): void {
	if (value < 0n || value > U64_MAX) {
		throw new ArithmeticOverflowError(value, context);
	}
}

/**
 * Convert a whole-unit amount to subunits, flooring any digits past the
 * ninth decimal place.
 *
 * @example
 * ```typescript
 * toSubunits(1.5);          // 1_500_000_000n
 * toSubunits("0.0000000019"); // 1n
 * ```
 */
export function toSubunits(amount: number | string): bigint {
	const text = typeof amount === "number" ? numberToText(amount) : amount.trim();
	const match = DECIMAL_PATTERN.exec(text);
	const intPart = match?.[1] ?? "";
	const fracPart = match?.[2] ?? "";

	if (!match || intPart.length + fracPart.length === 0) {
		throw new InvalidAmountError(String(amount));
	}

	const digits = intPart + fracPart;
	const exponent = Number(match[3] ?? "0");
	// Position of the decimal point within `digits` after scaling by 10^9
	const point = intPart.length + exponent + UNIT_DECIMALS;

	let subunits: bigint;
	if (point <= 0 || BigInt(digits) === 0n) {
		subunits = 0n;
	} else if (point - digits.length > MAX_U64_DIGITS) {
		throw new ArithmeticOverflowError(BigInt(digits), "Payment amount");
	} else if (point >= digits.length) {
		subunits = BigInt(digits) * 10n ** BigInt(point - digits.length);
	} else {
		subunits = BigInt(digits.slice(0, point));
	}

	assertU64(subunits, "Payment amount");
	return subunits;
}

/**
 * Render subunits as a whole-unit decimal without trailing zeros.
 */
export function formatSubunits(subunits: bigint): string {
	const sign = subunits < 0n ? "-" : "";
	const abs = subunits < 0n ? -subunits : subunits;
	const whole = abs / SUBUNITS_PER_UNIT;
	const fraction = (abs % SUBUNITS_PER_UNIT)
		.toString()
		.padStart(UNIT_DECIMALS, "0")
		.replace(/0+$/, "");
	return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}

function numberToText(amount: number): string {
	if (!Number.isFinite(amount) || amount < 0) {
		throw new InvalidAmountError(String(amount));
	}
	return amount.toString();
}
