/**
 * Intent Types
 *
 * An Intent pairs a Route (what must happen on the destination chain)
 * with a Reward (what is escrowed on the source chain for whoever
 * makes it happen).
 *
 * Both halves are immutable once hashed. Sequence order inside
 * `tokens` and `calls` is part of the content.
 */

import type { Address, Bytes32, ChainId, Hex, Timestamp } from "./primitives.js";

/**
 * A token and a quantity of it. Quantity is a uint256.
 */
export interface TokenAmount {
  readonly token: Address;
  readonly amount: bigint;
}

/**
 * One instruction to execute on the destination chain.
 */
export interface Call {
  readonly target: Address;
  readonly data: Hex;
  readonly value: bigint;
}

/**
 * Destination-side half of an intent.
 */
export interface Route {
  /** Creator-chosen nonce that keeps otherwise identical routes apart */
  readonly salt: Bytes32;

  /** Execution must occur by this time */
  readonly deadline: Timestamp;

  /** Entry point on the destination chain that executes the calls */
  readonly portal: Address;

  /** Native value the solver attaches */
  readonly nativeAmount: bigint;

  /** Tokens the solver must supply, in order */
  readonly tokens: readonly TokenAmount[];

  /** Calls to execute, in order */
  readonly calls: readonly Call[];
}

/**
 * Source-side half of an intent: the escrowed reward.
 */
export interface Reward {
  /** Refund eligibility starts at this time */
  readonly deadline: Timestamp;

  /** Receives the refund when no claim lands */
  readonly creator: Address;

  /** Prover that governs claims on this intent */
  readonly prover: Address;

  readonly nativeAmount: bigint;
  readonly tokens: readonly TokenAmount[];
}

/**
 * The unit of settlement.
 */
export interface Intent {
  readonly destination: ChainId;
  readonly route: Route;
  readonly reward: Reward;
}

/**
 * The three hashes that identify an intent.
 */
export interface IntentHashes {
  readonly intentHash: Bytes32;
  readonly routeHash: Bytes32;
  readonly rewardHash: Bytes32;
}
