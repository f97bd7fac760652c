/**
 * SDK Error Classes
 *
 * @example
 * ```typescript
 * import { InsufficientBalanceError } from '@referral-split/sdk';
 *
 * try {
 *   engine.settle(instruction);
 * } catch (e) {
 *   if (e instanceof InsufficientBalanceError) {
 *     console.log("Payer is short by", e.required - e.available);
 *   }
 * }
 * ```
 */

import type { AccountSlotName } from "./constants.js";

// =============================================================================
// Error Codes
// =============================================================================

/** Error codes for programmatic handling */
export type DistributorErrorCode =
	| "DECODE_ERROR"
	| "ACCOUNT_SHAPE"
	| "ARITHMETIC_OVERFLOW"
	| "INSUFFICIENT_BALANCE"
	| "REFERRAL_LOOKUP_FAILED"
	| "INVALID_CONFIG"
	| "INVALID_AMOUNT";

// =============================================================================
// SDK Errors
// =============================================================================

/** Base class for all SDK errors */
export class DistributorError extends Error {
	readonly code: DistributorErrorCode;

	constructor(
		code: DistributorErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		Object.setPrototypeOf(this, new.target.prototype);
		this.name = this.constructor.name;
		this.code = code;
	}
}

/** Instruction payload could not be decoded */
export class DecodeError extends DistributorError {
	constructor(message: string, options?: ErrorOptions) {
		super("DECODE_ERROR", message, options);
	}
}

/** Account list does not match the fixed six-slot shape */
export class AccountShapeError extends DistributorError {
	constructor(
		message: string,
		public readonly slot?: AccountSlotName,
		options?: ErrorOptions,
	) {
		super("ACCOUNT_SHAPE", message, options);
	}
}

/** Amount is outside the u64 range */
export class ArithmeticOverflowError extends DistributorError {
	constructor(
		public readonly value: bigint,
		context: string,
		options?: ErrorOptions,
	) {
		super(
			"ARITHMETIC_OVERFLOW",
			`${context} out of u64 range: ${value}`,
			options,
		);
	}
}

/** Payer cannot cover the summed transfers */
export class InsufficientBalanceError extends DistributorError {
	constructor(
		public readonly account: string,
		public readonly required: bigint,
		public readonly available: bigint,
		options?: ErrorOptions,
	) {
		super(
			"INSUFFICIENT_BALANCE",
			`Insufficient balance in ${account}: required ${required}, available ${available}`,
			options,
		);
	}
}

/** Referral service request failed (never fatal to a build) */
export class ReferralLookupError extends DistributorError {
	constructor(
		public readonly key: string,
		message: string,
		options?: ErrorOptions,
	) {
		super("REFERRAL_LOOKUP_FAILED", message, options);
	}
}

/** Distributor configuration failed validation */
export class InvalidConfigError extends DistributorError {
	constructor(message: string, options?: ErrorOptions) {
		super("INVALID_CONFIG", message, options);
	}
}

/** Payment amount is not a non-negative decimal */
export class InvalidAmountError extends DistributorError {
	constructor(
		public readonly input: string,
		options?: ErrorOptions,
	) {
		super("INVALID_AMOUNT", `Invalid payment amount: ${input}`, options);
	}
}
