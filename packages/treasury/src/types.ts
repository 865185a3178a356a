/**
 * @intentvault/treasury domain types.
 *
 * The treasury moves reward assets in and out of intent vaults:
 * - Funding (full, partial, or through a permit delegate)
 * - Withdrawal to the proven claimant
 * - Refund to the creator after the deadline
 * - Recovery of tokens that were never part of the reward
 *
 * Balances live in the AssetLedger; the treasury holds none itself.
 */

import type { Address, Bytes32, ChainId, Reward, TokenAmount } from "@intentvault/types";

// =============================================================================
// Funding
// =============================================================================

/**
 * A contract that holds standing approvals from funders and can move
 * their tokens into a vault on their behalf (a Permit2-style delegate).
 */
export interface PermitDelegate {
  readonly address: Address;

  /** Amount `owner` lets this delegate move to `spender` */
  allowance(token: Address, owner: Address, spender: Address): bigint;

  /** Move `amount` of `token` from `owner` to `to` under the owner's permit */
  transferFrom(token: Address, owner: Address, to: Address, amount: bigint): void;
}

export interface FundingOptions {
  readonly permitDelegate?: PermitDelegate | undefined;
  /** Accept whatever can be moved instead of failing on a shortfall. Default: false */
  readonly allowPartial?: boolean | undefined;
}

export interface FundingResult {
  readonly intentHash: Bytes32;
  readonly vault: Address;
  /** Amounts moved by this call; NATIVE_ASSET for native currency */
  readonly transferred: readonly TokenAmount[];
  /** Whether the vault now holds the full reward */
  readonly complete: boolean;
}

// =============================================================================
// Distribution
// =============================================================================

export interface DistributionResult {
  readonly intentHash: Bytes32;
  readonly vault: Address;
  readonly recipient: Address;
  readonly transferred: readonly TokenAmount[];
}

/**
 * One element of a withdrawal batch: a (destination, routeHash, reward)
 * triple as carried by the parallel input arrays.
 */
export interface WithdrawalRequest {
  readonly destination: ChainId;
  readonly routeHash: Bytes32;
  readonly reward: Reward;
}

export type BatchOutcome =
  | { readonly intentHash: Bytes32; readonly ok: true; readonly result: DistributionResult }
  | {
      readonly intentHash?: Bytes32 | undefined;
      readonly ok: false;
      readonly error: { readonly code: string; readonly message: string };
    };

/**
 * Gives whatever holds proofs a chance to settle a claim before the
 * distributor reads claim state. Proofs may arrive before the intent
 * is known to the source chain.
 */
export interface ClaimResolver {
  resolve(intentHash: Bytes32, destination: ChainId, reward: Reward): void;
}

/** Current ledger time in unix seconds */
export type Clock = () => bigint;
