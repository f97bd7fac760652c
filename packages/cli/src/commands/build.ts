/**
 * Build Command
 *
 * Resolve a referral code and print the distribution instruction.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, log, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import {
  type PaymentDistribution,
  createDistributorClient,
} from "@referral-split/sdk";
import { getReferralLookup, requireConfig } from "../lib/config.js";
import {
  accountRoleLabel,
  printAllocation,
  reportError,
} from "../lib/format.js";

interface BuildFlags {
  payer: string;
  amount: string;
  referralCode?: string;
}

const SLOT_LABELS = [
  "payer",
  "treasury",
  "team",
  "first referrer",
  "second referrer",
  "system program",
];

export const buildInstructionCommand = buildCommand({
  docs: {
    brief: "Build a distribution instruction",
  },
  parameters: {
    flags: {
      payer: {
        kind: "parsed",
        parse: String,
        brief: "Paying wallet address",
      },
      amount: {
        kind: "parsed",
        parse: String,
        brief: "Amount in SOL (e.g., 1.5)",
      },
      referralCode: {
        kind: "parsed",
        parse: String,
        brief: "Referral code to resolve via REFERRAL_API_URL",
        optional: true,
      },
    },
    positional: { kind: "tuple", parameters: [] },
  },
  async func(this: CommandContext, { payer, amount, referralCode }: BuildFlags) {
    intro(pc.cyan("Referral Split - Build"));

    const distributor = createDistributorClient({
      config: requireConfig(),
      lookup: getReferralLookup(),
      onWarning: (warning) => log.warn(warning.message),
    });

    const s = spinner();
    s.start(referralCode ? `Resolving ${referralCode}` : "Building");

    let distribution: PaymentDistribution;
    try {
      distribution = await distributor.build({ amount, payer, referralCode });
    } catch (error) {
      s.stop("Build failed");
      reportError(error);
      throw new Error("Build failed", { cause: error });
    }
    s.stop("Instruction ready");

    const { instruction, preview } = distribution;

    console.log();
    console.log(pc.bold("Program"));
    console.log(`  ${instruction.programAddress}`);

    console.log();
    console.log(pc.bold("Accounts"));
    (instruction.accounts ?? []).forEach((meta, index) => {
      const label = (SLOT_LABELS[index] ?? `#${index}`).padEnd(16);
      console.log(
        `  ${pc.dim(label)} ${meta.address} ${pc.dim(accountRoleLabel(meta.role))}`,
      );
    });

    console.log();
    console.log(pc.bold("Data"));
    console.log(
      `  ${Buffer.from(Uint8Array.from(instruction.data ?? [])).toString("base64")}`,
    );

    console.log();
    console.log(pc.bold("Allocation"));
    printAllocation(preview);

    outro(pc.dim("Sign with the payer wallet and submit"));
  },
});
