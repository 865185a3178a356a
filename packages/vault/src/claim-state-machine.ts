/**
 * Claim State Machine — Single-release semantics per intent hash.
 *
 * initiated ──▶ claimed   (valid proof)
 *           └─▶ refunded  (deadline passed, no claim)
 *
 * Rules:
 * - "initiated" is the absent record; nothing is stored until a transition
 * - claimed and refunded are terminal and mutually exclusive
 * - A claim replay with the same claimant is a no-op; a different claimant is an error
 * - A claimed vault is drained exactly once (the `withdrawn` flag)
 */

import type { Address, Bytes32, ChainId, ClaimState, ClaimStatus } from "@intentvault/types";
import type { ClaimOutcome, ClaimRecord, ClaimSnapshot, RecordOptions } from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class ClaimError extends Error {
  public readonly code: ClaimErrorCode;
  constructor(code: ClaimErrorCode, message: string) {
    super(message);
    this.name = "ClaimError";
    this.code = code;
  }
}

export type ClaimErrorCode =
  | "ALREADY_CLAIMED"
  | "ALREADY_REFUNDED"
  | "ALREADY_WITHDRAWN"
  | "NOT_CLAIMED"
  | "INVALID_TRANSITION";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<ClaimStatus, readonly ClaimStatus[]> = {
  initiated: ["claimed", "refunded"],
  claimed: [],
  refunded: [],
};

const INITIATED: ClaimState = { status: "initiated", withdrawn: false };

function hashKey(intentHash: Bytes32): string {
  return intentHash.toLowerCase();
}

// =============================================================================
// Claim State Machine
// =============================================================================

export class ClaimStateMachine {
  private readonly claims: Map<string, ClaimRecord> = new Map();
  private readonly clock: () => Date;

  constructor(options: RecordOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Apply a proven claim.
   *
   * @returns "duplicate" when the same claimant was already recorded
   */
  recordClaim(
    intentHash: Bytes32,
    claimant: Address,
    destination: ChainId,
    prover: Address,
  ): ClaimOutcome {
    const current = this.getState(intentHash);

    if (current.status === "claimed") {
      if (current.claimant !== undefined && current.claimant.toLowerCase() === claimant.toLowerCase()) {
        return "duplicate";
      }
      throw new ClaimError(
        "ALREADY_CLAIMED",
        `Intent ${intentHash} is already claimed by ${current.claimant ?? "unknown"}`,
      );
    }
    this.assertTransition(intentHash, current, "claimed");

    this.claims.set(hashKey(intentHash), {
      intentHash,
      status: "claimed",
      claimant,
      destination,
      prover,
      withdrawn: false,
      updatedAt: this.clock().toISOString(),
    });
    return "applied";
  }

  /**
   * Move an unclaimed intent to "refunded". The refund drains the vault
   * in the same call, so the record is born withdrawn.
   */
  markRefunded(intentHash: Bytes32): ClaimRecord {
    const current = this.getState(intentHash);
    this.assertTransition(intentHash, current, "refunded");

    const record: ClaimRecord = {
      intentHash,
      status: "refunded",
      withdrawn: true,
      updatedAt: this.clock().toISOString(),
    };
    this.claims.set(hashKey(intentHash), record);
    return record;
  }

  /**
   * Record that a claimed vault has been paid out.
   */
  markWithdrawn(intentHash: Bytes32): ClaimRecord {
    const current = this.assertWithdrawable(intentHash);
    const updated: ClaimRecord = {
      ...current,
      withdrawn: true,
      updatedAt: this.clock().toISOString(),
    };
    this.claims.set(hashKey(intentHash), updated);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Guards
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Check that a withdrawal may proceed, without changing anything.
   */
  assertWithdrawable(intentHash: Bytes32): ClaimRecord {
    const record = this.claims.get(hashKey(intentHash));
    if (record === undefined || record.status !== "claimed") {
      throw new ClaimError(
        "NOT_CLAIMED",
        `Intent ${intentHash} is ${record?.status ?? "initiated"}, not claimed`,
      );
    }
    if (record.withdrawn) {
      throw new ClaimError("ALREADY_WITHDRAWN", `Rewards for ${intentHash} were already withdrawn`);
    }
    return record;
  }

  /**
   * Check that a refund may proceed, without changing anything.
   */
  assertRefundable(intentHash: Bytes32): void {
    this.assertTransition(intentHash, this.getState(intentHash), "refunded");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getState(intentHash: Bytes32): ClaimState {
    return this.claims.get(hashKey(intentHash)) ?? INITIATED;
  }

  getStatus(intentHash: Bytes32): ClaimStatus {
    return this.getState(intentHash).status;
  }

  listClaims(status?: ClaimStatus): readonly ClaimRecord[] {
    const all = [...this.claims.values()];
    if (status === undefined) return all;
    return all.filter((c) => c.status === status);
  }

  get size(): number {
    return this.claims.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): ClaimSnapshot {
    return { version: 1, claims: [...this.claims.values()] };
  }

  static fromSnapshot(snapshot: ClaimSnapshot, options: RecordOptions = {}): ClaimStateMachine {
    const machine = new ClaimStateMachine(options);
    for (const claim of snapshot.claims) {
      machine.claims.set(hashKey(claim.intentHash), claim);
    }
    return machine;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private assertTransition(intentHash: Bytes32, current: ClaimState, to: ClaimStatus): void {
    if (current.status === "claimed") {
      throw new ClaimError("ALREADY_CLAIMED", `Intent ${intentHash} is already claimed`);
    }
    if (current.status === "refunded") {
      throw new ClaimError("ALREADY_REFUNDED", `Intent ${intentHash} was already refunded`);
    }
    if (!VALID_TRANSITIONS[current.status].includes(to)) {
      throw new ClaimError(
        "INVALID_TRANSITION",
        `Cannot move intent ${intentHash} from '${current.status}' to '${to}'`,
      );
    }
  }
}
