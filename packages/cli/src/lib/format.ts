/**
 * Terminal formatting helpers
 */

import pc from "picocolors";
import { log } from "@clack/prompts";
import { AccountRole } from "@solana/kit";
import {
  type AllocationLine,
  type AllocationRole,
  DistributorError,
  formatSubunits,
} from "@referral-split/sdk";

const ROLE_LABELS: Record<AllocationRole, string> = {
  treasury: "Treasury",
  team: "Team",
  first: "First-tier referrer",
  second: "Second-tier referrer",
};

const ACCOUNT_ROLE_LABELS: Record<AccountRole, string> = {
  [AccountRole.READONLY]: "readonly",
  [AccountRole.WRITABLE]: "writable",
  [AccountRole.READONLY_SIGNER]: "signer",
  [AccountRole.WRITABLE_SIGNER]: "writable signer",
};

/**
 * Print allocation lines as an aligned table.
 */
export function printAllocation(lines: AllocationLine[]): void {
  for (const { role, amount } of lines) {
    const label = ROLE_LABELS[role].padEnd(22);
    const value = amount > 0n ? pc.green(formatSubunits(amount)) : pc.dim("0");
    console.log(`  ${pc.dim(label)} ${value} ${pc.dim(`(${amount} lamports)`)}`);
  }
}

export function accountRoleLabel(role: AccountRole): string {
  return ACCOUNT_ROLE_LABELS[role];
}

/**
 * Log a failure, prefixed with its error code when it has one.
 */
export function reportError(error: unknown): void {
  if (error instanceof DistributorError) {
    log.error(`${pc.red(error.code)} ${error.message}`);
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
}
