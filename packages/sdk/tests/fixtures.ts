/**
 * Test fixtures shared by SDK and engine tests
 */

import { type Address, address } from "@solana/kit";
import { createDistributorConfig } from "../src/config.js";

/**
 * Well-known test pubkeys (deterministic for reproducible tests)
 */
export const TEST_ADDRESSES = {
	payer: address("9xQeWvG816bUx9EPjHmaT23yvVM2ZWbrrpZb9PusVFin"),
	treasury: address("HN7cABqLq46Es1jh92dQQisAq662SmxELLLsHHe4YWrH"),
	team: address("F2vVvFwrbGHtsBEqFkSkLvsM6SJmDMm7KqhiW2P64WxY"),
	firstReferrer: address("8ACGYVcVNHToCa6anLweeFnBTV1Q2QQsvh21zWkW6N8i"),
	secondReferrer: address("EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v"),
	stranger: address("TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA"),
} satisfies Record<string, Address>;

/** Config with default caps (0.2 / 0.05 SOL) */
export const TEST_CONFIG = createDistributorConfig({
	treasury: TEST_ADDRESSES.treasury,
	team: TEST_ADDRESSES.team,
});

export const SOL = 1_000_000_000n;
