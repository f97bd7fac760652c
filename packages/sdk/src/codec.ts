/**
 * Payment request wire format (10 bytes, fixed)
 *
 * Structure:
 * - gross_amount: 8 bytes (u64 LE, subunits)
 * - has_first_referrer: 1 byte (0 = false, nonzero = true)
 * - has_second_referrer: 1 byte (0 = false, nonzero = true)
 */

import {
	type ReadonlyUint8Array,
	getStructCodec,
	getU64Codec,
	getU8Codec,
} from "@solana/kit";
import type { PaymentRequest } from "./allocation.js";
import { PAYMENT_REQUEST_SIZE } from "./constants.js";
import { assertU64 } from "./amounts.js";
import { DecodeError } from "./errors.js";

// Flags stay u8 on the wire: the boolean codec reads only 1 as true
const paymentRequestCodec = getStructCodec([
	["grossAmount", getU64Codec()],
	["hasFirstReferrer", getU8Codec()],
	["hasSecondReferrer", getU8Codec()],
]);

/**
 * Encode a payment request into its 10-byte payload.
 * Flags are written as 1 or 0.
 */
export function encodePaymentRequest(request: PaymentRequest): Uint8Array {
	assertU64(request.grossAmount, "Gross amount");
	return Uint8Array.from(
		paymentRequestCodec.encode({
			grossAmount: request.grossAmount,
			hasFirstReferrer: request.hasFirstReferrer ? 1 : 0,
			hasSecondReferrer: request.hasSecondReferrer ? 1 : 0,
		}),
	);
}

/**
 * Decode a 10-byte payload. Any other length is a `DecodeError`.
 */
export function decodePaymentRequest(
	data: ReadonlyUint8Array | Uint8Array | undefined,
): PaymentRequest {
	if (!data) {
		throw new DecodeError("Instruction has no data");
	}
	if (data.length !== PAYMENT_REQUEST_SIZE) {
		throw new DecodeError(
			`Invalid payment request size: expected ${PAYMENT_REQUEST_SIZE}, got ${data.length}`,
		);
	}

	const raw = paymentRequestCodec.decode(data);
	return {
		grossAmount: raw.grossAmount,
		hasFirstReferrer: raw.hasFirstReferrer !== 0,
		hasSecondReferrer: raw.hasSecondReferrer !== 0,
	};
}
