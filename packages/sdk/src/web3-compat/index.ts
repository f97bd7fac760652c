/**
 * Web3.js compatibility layer
 *
 * Bridge functions between @solana/kit instructions and @solana/web3.js
 * TransactionInstruction, for wallets and apps still on web3.js.
 */

import { fromLegacyTransactionInstruction } from "@solana/compat";
import {
	type Address,
	type Instruction,
	isSignerRole,
	isWritableRole,
} from "@solana/kit";
import {
	PublicKey,
	type PublicKeyInitData,
	TransactionInstruction,
} from "@solana/web3.js";

/**
 * Convert a @solana/kit Address to a @solana/web3.js PublicKey
 */
export function toPublicKey(input: Address | PublicKeyInitData): PublicKey {
	if (input instanceof PublicKey) {
		return input;
	}
	return new PublicKey(input);
}

/**
 * Convert a @solana/kit Instruction to a @solana/web3.js TransactionInstruction
 *
 * @example
 * ```typescript
 * const { instruction } = await distributor.build({ amount: 1, payer });
 * const tx = new Transaction().add(toWeb3Instruction(instruction));
 * ```
 */
export function toWeb3Instruction(
	kitInstruction: Instruction,
): TransactionInstruction {
	const keys =
		kitInstruction.accounts?.map((account) => ({
			isSigner: isSignerRole(account.role),
			isWritable: isWritableRole(account.role),
			pubkey: toPublicKey(account.address),
		})) ?? [];

	return new TransactionInstruction({
		data: kitInstruction.data
			? Buffer.from(Uint8Array.from(kitInstruction.data))
			: Buffer.alloc(0),
		keys,
		programId: toPublicKey(kitInstruction.programAddress),
	});
}

/**
 * Convert a @solana/web3.js TransactionInstruction to a @solana/kit Instruction
 */
export function fromWeb3Instruction(
	legacyInstruction: TransactionInstruction,
): Instruction {
	return fromLegacyTransactionInstruction(legacyInstruction);
}
