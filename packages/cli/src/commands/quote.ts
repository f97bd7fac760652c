/**
 * Quote Command
 *
 * Show how a payment would be split, without building an instruction.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, outro } from "@clack/prompts";
import pc from "picocolors";
import {
  DEFAULT_FIRST_REFERRER_CAP,
  DEFAULT_SECOND_REFERRER_CAP,
  formatSubunits,
  previewAllocation,
  toSubunits,
} from "@referral-split/sdk";
import { printAllocation } from "../lib/format.js";

interface QuoteFlags {
  first: boolean;
  second: boolean;
  firstCap?: string;
  secondCap?: string;
}

export const quoteCommand = buildCommand({
  docs: {
    brief: "Preview how a payment is split",
  },
  parameters: {
    flags: {
      first: {
        kind: "boolean",
        brief: "Include a first-tier referrer",
        default: false,
      },
      second: {
        kind: "boolean",
        brief: "Include a second-tier referrer",
        default: false,
      },
      firstCap: {
        kind: "parsed",
        parse: String,
        brief: "First-tier cap in SOL (default 0.2)",
        optional: true,
      },
      secondCap: {
        kind: "parsed",
        parse: String,
        brief: "Second-tier cap in SOL (default 0.05)",
        optional: true,
      },
    },
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "Amount in SOL (e.g., 1.5)",
          parse: String,
        },
      ],
    },
  },
  func(this: CommandContext, flags: QuoteFlags, amount: string) {
    intro(pc.cyan("Referral Split - Quote"));

    const grossAmount = toSubunits(amount);
    const caps = {
      first: flags.firstCap
        ? toSubunits(flags.firstCap)
        : DEFAULT_FIRST_REFERRER_CAP,
      second: flags.secondCap
        ? toSubunits(flags.secondCap)
        : DEFAULT_SECOND_REFERRER_CAP,
    };

    console.log();
    printAllocation(
      previewAllocation(
        {
          grossAmount,
          hasFirstReferrer: flags.first,
          hasSecondReferrer: flags.second,
        },
        caps,
      ),
    );
    console.log();

    outro(`${pc.bold(formatSubunits(grossAmount))} SOL distributed`);
  },
});
