import { buildApplication, buildRouteMap } from "@stricli/core";
import pkg from "../package.json" with { type: "json" };
import { versionCommand } from "./commands/version.js";
import { quoteCommand } from "./commands/quote.js";
import { buildInstructionCommand } from "./commands/build.js";
import { simulateCommand } from "./commands/simulate.js";

const routes = buildRouteMap({
  routes: {
    version: versionCommand,
    quote: quoteCommand,
    build: buildInstructionCommand,
    simulate: simulateCommand,
  },
  docs: {
    brief: pkg.description,
  },
});

export const app = buildApplication(routes, {
  name: "referral-split",
  versionInfo: {
    currentVersion: pkg.version,
  },
  scanner: {
    caseStyle: "allow-kebab-for-camel",
  },
});
