/**
 * Simulate Command
 *
 * Build an instruction and settle it against an in-memory ledger.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, log, outro } from "@clack/prompts";
import pc from "picocolors";
import { type Instruction, address } from "@solana/kit";
import {
  type ReferralChain,
  buildDistributionInstruction,
  formatSubunits,
  toSubunits,
} from "@referral-split/sdk";
import {
  InMemoryLedger,
  type SettlementEngine,
  createSettlementEngine,
} from "@referral-split/engine";
import { requireConfig } from "../lib/config.js";
import { reportError } from "../lib/format.js";

interface SimulateFlags {
  amount: string;
  payerBalance: string;
  payer?: string;
  firstReferrer?: string;
  secondReferrer?: string;
}

// Stand-in payer when none is given; any valid address works in memory
const DEFAULT_PAYER = "Auth1111111111111111111111111111111111111111";

export const simulateCommand = buildCommand({
  docs: {
    brief: "Settle a distribution against an in-memory ledger",
  },
  parameters: {
    flags: {
      amount: {
        kind: "parsed",
        parse: String,
        brief: "Amount in SOL (e.g., 1.5)",
      },
      payerBalance: {
        kind: "parsed",
        parse: String,
        brief: "Starting payer balance in SOL",
      },
      payer: {
        kind: "parsed",
        parse: String,
        brief: "Payer address",
        optional: true,
      },
      firstReferrer: {
        kind: "parsed",
        parse: String,
        brief: "First-tier referrer address",
        optional: true,
      },
      secondReferrer: {
        kind: "parsed",
        parse: String,
        brief: "Second-tier referrer address (requires --first-referrer)",
        optional: true,
      },
    },
    positional: { kind: "tuple", parameters: [] },
  },
  func(this: CommandContext, flags: SimulateFlags) {
    intro(pc.cyan("Referral Split - Simulate"));

    let settlement: SettlementSetup;
    try {
      settlement = prepareSettlement(flags);
    } catch (error) {
      reportError(error);
      throw new Error("Simulation failed", { cause: error });
    }

    const { ledger, engine, instruction } = settlement;
    const result = engine.trySettle(instruction);

    if (result.status === "rejected") {
      reportError(result.error);
      throw new Error(`Settlement rejected: ${result.reason}`, {
        cause: result.error,
      });
    }

    console.log();
    console.log(pc.bold("Transfers"));
    for (const { role, destination, amount } of result.receipt.transfers) {
      console.log(
        `  ${pc.dim(role.padEnd(9))} ${destination} ${pc.green(formatSubunits(amount))}`,
      );
    }

    console.log();
    console.log(pc.bold("Balances"));
    for (const [account, balance] of ledger.snapshot()) {
      console.log(`  ${account} ${formatSubunits(balance)}`);
    }

    outro(pc.green("Settled"));
  },
});

interface SettlementSetup {
  ledger: InMemoryLedger;
  engine: SettlementEngine;
  instruction: Instruction;
}

function prepareSettlement(flags: SimulateFlags): SettlementSetup {
  const config = requireConfig();
  const payer = address(flags.payer ?? DEFAULT_PAYER);

  let referrers: ReferralChain = { kind: "none" };
  if (flags.firstReferrer) {
    const first = address(flags.firstReferrer);
    referrers = flags.secondReferrer
      ? { kind: "both", first, second: address(flags.secondReferrer) }
      : { kind: "first", first };
  } else if (flags.secondReferrer) {
    log.warn("--second-referrer ignored without --first-referrer");
  }

  const { instruction } = buildDistributionInstruction({
    config,
    payer,
    grossAmount: toSubunits(flags.amount),
    referrers,
  });

  const ledger = new InMemoryLedger([[payer, toSubunits(flags.payerBalance)]]);
  const engine = createSettlementEngine({ config, ledger });
  return { ledger, engine, instruction };
}
