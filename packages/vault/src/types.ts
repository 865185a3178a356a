/**
 * Vault Types
 *
 * One vault per intent hash. The registry remembers what each vault
 * escrows; the claim state machine remembers who may drain it.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Records are keyed by intent hash; vault addresses are derived, not stored pointers
 * - Terminal claim states are never left
 */

import type {
  Address,
  Bytes32,
  ChainId,
  ClaimState,
  Reward,
  Route,
} from "@intentvault/types";

// =============================================================================
// Intent Records
// =============================================================================

/**
 * What the source chain knows about an intent once it is published
 * or funded. The route itself is only known when it was published.
 */
export interface IntentRecord {
  readonly intentHash: Bytes32;
  readonly destination: ChainId;
  readonly routeHash: Bytes32;
  readonly reward: Reward;
  readonly route?: Route | undefined;
  readonly vault: Address;

  /** Publication makes the full intent discoverable to solvers */
  readonly published: boolean;

  /** A funding call has completed against the vault */
  readonly funded: boolean;

  readonly recordedAt: string;
}

/** Options shared by the registry and the claim machine. */
export interface RecordOptions {
  /** Source of record timestamps. Defaults to the wall clock. */
  readonly clock?: () => Date;
}

// =============================================================================
// Claims
// =============================================================================

/**
 * Result of applying a claim. A replay that agrees with the stored
 * claimant is a successful no-op.
 */
export type ClaimOutcome = "applied" | "duplicate";

export interface ClaimRecord extends ClaimState {
  readonly intentHash: Bytes32;
  readonly updatedAt: string;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface IntentRegistrySnapshot {
  readonly version: 1;
  readonly records: readonly IntentRecord[];
}

export interface ClaimSnapshot {
  readonly version: 1;
  readonly claims: readonly ClaimRecord[];
}
