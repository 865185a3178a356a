/**
 * Claim Types
 *
 * Each intent hash has at most one claim record. The absent record
 * reads as "initiated"; "claimed" and "refunded" are terminal.
 */

import type { Address, ChainId } from "./primitives.js";

export type ClaimStatus = "initiated" | "claimed" | "refunded";

export interface ClaimState {
  readonly status: ClaimStatus;

  /** Solver entitled to the reward (set when claimed) */
  readonly claimant?: Address | undefined;

  /** Chain the fulfillment was proven on (set when claimed) */
  readonly destination?: ChainId | undefined;

  /** Prover that delivered the claim (set when claimed) */
  readonly prover?: Address | undefined;

  /** Vault has been drained for this terminal state */
  readonly withdrawn: boolean;
}

/**
 * Funding completeness as seen from vault balances.
 */
export type FundingStatus = "unfunded" | "partial" | "funded";
