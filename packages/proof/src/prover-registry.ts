/**
 * @intentvault/proof — Prover registry.
 *
 * Maps prover addresses to their verifier and keeps each prover's
 * record of proven intents. A relayed batch is applied all-or-nothing:
 * every claim is checked against the record before any is stored.
 */

import { getAddress, isAddressEqual } from "viem";
import type { Address, Bytes32, ChainId, Timestamp } from "@intentvault/types";
import type {
  ProofEvidence,
  ProofVerifier,
  ProvingMechanism,
  TrustedBlockHashes,
  VerificationContext,
  VerifiedClaim,
} from "./types.js";
import { ProofError } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface ProvenIntent {
  readonly claimant: Address;
  readonly destination: ChainId;
  readonly provenAt: Timestamp;
}

export type ProofOutcome = "applied" | "duplicate";

export interface RecordedProof extends VerifiedClaim {
  readonly outcome: ProofOutcome;
}

export interface RegisteredProver {
  readonly address: Address;
  readonly mechanism: ProvingMechanism;
}

interface ProverEntry {
  readonly address: Address;
  readonly verifier: ProofVerifier;
  readonly proven: Map<string, ProvenIntent>;
}

// =============================================================================
// ProverRegistry
// =============================================================================

export class ProverRegistry {
  private readonly provers = new Map<string, ProverEntry>();

  /**
   * Register a verifier under a prover address.
   *
   * @throws {ProofError} DUPLICATE_PROVER
   */
  register<E extends ProofEvidence>(address: Address, verifier: ProofVerifier<E>): void {
    const key = address.toLowerCase();
    if (this.provers.has(key)) {
      throw new ProofError("DUPLICATE_PROVER", `Prover ${address} is already registered`);
    }
    this.provers.set(key, {
      address: getAddress(address),
      verifier: widen(verifier),
      proven: new Map(),
    });
  }

  has(address: Address): boolean {
    return this.provers.has(address.toLowerCase());
  }

  get(address: Address): RegisteredProver | undefined {
    const entry = this.provers.get(address.toLowerCase());
    return entry === undefined ? undefined : { address: entry.address, mechanism: entry.verifier.mechanism };
  }

  list(): readonly RegisteredProver[] {
    return [...this.provers.values()].map((e) => ({ address: e.address, mechanism: e.verifier.mechanism }));
  }

  /**
   * Run the prover's verifier. Records nothing.
   *
   * @throws {ProofError} UNKNOWN_PROVER, UNAUTHORIZED_PROOF_SOURCE when the
   *   evidence belongs to another mechanism, or whatever the verifier throws
   */
  verify(prover: Address, evidence: ProofEvidence, context: VerificationContext): readonly VerifiedClaim[] {
    const entry = this.require(prover);
    if (entry.verifier.mechanism !== evidence.kind) {
      throw new ProofError(
        "UNAUTHORIZED_PROOF_SOURCE",
        `Prover ${entry.address} verifies ${entry.verifier.mechanism} proofs, not ${evidence.kind}`,
      );
    }
    return entry.verifier.verify(evidence, context);
  }

  /**
   * Store verified claims in the prover's record.
   *
   * Re-proving an intent for the same claimant is a no-op ("duplicate");
   * for a different claimant the whole batch is rejected.
   *
   * @throws {ProofError} UNKNOWN_PROVER, ALREADY_CLAIMED
   */
  record(prover: Address, claims: readonly VerifiedClaim[], provenAt: Timestamp): readonly RecordedProof[] {
    const entry = this.require(prover);
    const pending = new Map<string, ProvenIntent>();

    const outcomes = claims.map((claim): RecordedProof => {
      const key = claim.intentHash.toLowerCase();
      const existing = entry.proven.get(key) ?? pending.get(key);
      if (existing !== undefined) {
        if (!isAddressEqual(existing.claimant, claim.claimant)) {
          throw new ProofError(
            "ALREADY_CLAIMED",
            `Intent ${claim.intentHash} is already proven for ${existing.claimant}`,
          );
        }
        return { ...claim, outcome: "duplicate" };
      }
      pending.set(key, { claimant: getAddress(claim.claimant), destination: claim.destination, provenAt });
      return { ...claim, outcome: "applied" };
    });

    for (const [key, proven] of pending) {
      entry.proven.set(key, proven);
    }
    return outcomes;
  }

  /**
   * Verify and record in one step.
   */
  relay(prover: Address, evidence: ProofEvidence, context: VerificationContext): readonly RecordedProof[] {
    return this.record(prover, this.verify(prover, evidence, context), context.now);
  }

  /**
   * Drop a stored proof whose destination is not `destination`, freeing
   * the intent for a correct proof.
   *
   * @returns true when a proof was dropped
   */
  challenge(prover: Address, intentHash: Bytes32, destination: ChainId): boolean {
    const proven = this.provers.get(prover.toLowerCase())?.proven;
    const key = intentHash.toLowerCase();
    const existing = proven?.get(key);
    if (proven === undefined || existing === undefined || existing.destination === destination) {
      return false;
    }
    return proven.delete(key);
  }

  provenIntent(prover: Address, intentHash: Bytes32): ProvenIntent | undefined {
    return this.provers.get(prover.toLowerCase())?.proven.get(intentHash.toLowerCase());
  }

  private require(prover: Address): ProverEntry {
    const entry = this.provers.get(prover.toLowerCase());
    if (entry === undefined) {
      throw new ProofError("UNKNOWN_PROVER", `No prover registered at ${prover}`);
    }
    return entry;
  }
}

/**
 * A verifier for one evidence kind, callable with any evidence once the
 * registry has checked the kind matches.
 */
function widen<E extends ProofEvidence>(verifier: ProofVerifier<E>): ProofVerifier {
  return {
    mechanism: verifier.mechanism,
    verify(evidence, context) {
      if (!isEvidenceFor(verifier, evidence)) {
        throw new ProofError(
          "UNAUTHORIZED_PROOF_SOURCE",
          `Expected ${verifier.mechanism} evidence, got ${evidence.kind}`,
        );
      }
      return verifier.verify(evidence, context);
    },
  };
}

function isEvidenceFor<E extends ProofEvidence>(
  verifier: ProofVerifier<E>,
  evidence: ProofEvidence,
): evidence is E {
  return evidence.kind === verifier.mechanism;
}

// =============================================================================
// Trusted Block Hashes
// =============================================================================

/**
 * Block hashes fed in by whatever tracks the settlement layer.
 */
export class InMemoryTrustedBlockHashes implements TrustedBlockHashes {
  private readonly hashes = new Map<ChainId, Set<string>>();

  trust(chainId: ChainId, blockHash: Bytes32): void {
    const set = this.hashes.get(chainId) ?? new Set<string>();
    set.add(blockHash.toLowerCase());
    this.hashes.set(chainId, set);
  }

  revoke(chainId: ChainId, blockHash: Bytes32): void {
    this.hashes.get(chainId)?.delete(blockHash.toLowerCase());
  }

  isTrusted(chainId: ChainId, blockHash: Bytes32): boolean {
    return this.hashes.get(chainId)?.has(blockHash.toLowerCase()) ?? false;
  }
}
