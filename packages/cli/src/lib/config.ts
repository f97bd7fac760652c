/**
 * CLI environment
 *
 * The only place that reads `process.env`. Everything below receives the
 * resulting configuration explicitly.
 */

import {
  type DistributorConfig,
  type ReferralLookupService,
  createHttpReferralLookup,
  loadDistributorConfig,
} from "@referral-split/sdk";

/**
 * Distributor configuration from TREASURY_WALLET, TEAM_WALLET and friends.
 */
export function requireConfig(): DistributorConfig {
  return loadDistributorConfig(process.env);
}

/**
 * Referral lookup from REFERRAL_API_URL, or undefined when unset.
 */
export function getReferralLookup(): ReferralLookupService | undefined {
  const baseUrl = process.env.REFERRAL_API_URL;
  return baseUrl ? createHttpReferralLookup({ baseUrl }) : undefined;
}
