/**
 * @intentvault/proof — Core types.
 *
 * Every proving mechanism turns mechanism-specific evidence into the
 * same thing: a list of (intentHash, claimant, destination) triples
 * the source chain may trust. Only the verification differs.
 */

import type { Address, Bytes32, ChainId, Hex, Timestamp } from "@intentvault/types";

// =============================================================================
// Mechanisms
// =============================================================================

export type ProvingMechanism = "self" | "bedrock" | "cannon" | "nitro" | "hyperProver";

// =============================================================================
// Evidence
// =============================================================================

/**
 * Storage proof that `fulfilled[intentHash]` on the destination inbox
 * holds the claimant.
 */
export interface FulfillmentProof {
  readonly intentHash: Bytes32;
  readonly claimant: Address;
  readonly storageProof: readonly Hex[];
}

export interface SelfEvidence {
  readonly kind: "self";
  readonly attester: Address;
  readonly destination: ChainId;
  readonly claims: readonly { readonly intentHash: Bytes32; readonly claimant: Address }[];
}

/**
 * Preimage of an OP-stack output root.
 */
export interface OutputRootPreimage {
  readonly version: Bytes32;
  readonly stateRoot: Bytes32;
  readonly messagePasserStorageRoot: Bytes32;
  readonly latestBlockHash: Bytes32;
}

export interface BedrockEvidence {
  readonly kind: "bedrock";
  readonly destination: ChainId;
  /** RLP-encoded settlement-layer block header the source chain trusts */
  readonly settlementHeader: Hex;
  readonly outputIndex: bigint;
  readonly outputOracleAccountProof: readonly Hex[];
  readonly outputRootStorageProof: readonly Hex[];
  readonly output: OutputRootPreimage;
  readonly inboxAccountProof: readonly Hex[];
  readonly fulfillments: readonly FulfillmentProof[];
}

export interface CannonEvidence {
  readonly kind: "cannon";
  readonly destination: ChainId;
  readonly settlementHeader: Hex;
  readonly gameIndex: bigint;
  readonly factoryAccountProof: readonly Hex[];
  readonly gameListStorageProof: readonly Hex[];
  readonly gameAccountProof: readonly Hex[];
  readonly gameStatusStorageProof: readonly Hex[];
  readonly rootClaimStorageProof: readonly Hex[];
  readonly output: OutputRootPreimage;
  readonly inboxAccountProof: readonly Hex[];
  readonly fulfillments: readonly FulfillmentProof[];
}

export interface NitroEvidence {
  readonly kind: "nitro";
  readonly destination: ChainId;
  readonly settlementHeader: Hex;
  readonly nodeNumber: bigint;
  readonly rollupAccountProof: readonly Hex[];
  readonly latestConfirmedStorageProof: readonly Hex[];
  readonly confirmDataStorageProof: readonly Hex[];
  /** RLP-encoded destination block header; extraData carries the send root */
  readonly destinationHeader: Hex;
  readonly inboxAccountProof: readonly Hex[];
  readonly fulfillments: readonly FulfillmentProof[];
}

/**
 * A message delivered by the relay network's mailbox.
 */
export interface HyperEvidence {
  readonly kind: "hyperProver";
  /** Account that invoked the handler; must be the mailbox */
  readonly caller: Address;
  /** Origin domain (the destination chain of the intents) */
  readonly origin: ChainId;
  /** Prover on the origin domain that sent the message, as bytes32 */
  readonly sender: Bytes32;
  /** abi.encode(bytes32[] intentHashes, address[] claimants) */
  readonly body: Hex;
}

export type ProofEvidence =
  | SelfEvidence
  | BedrockEvidence
  | CannonEvidence
  | NitroEvidence
  | HyperEvidence;

// =============================================================================
// Verification
// =============================================================================

export interface VerifiedClaim {
  readonly intentHash: Bytes32;
  readonly claimant: Address;
  readonly destination: ChainId;
}

/**
 * What the source chain can tell a verifier at verification time.
 */
export interface VerificationContext {
  readonly now: Timestamp;
  /** Creator of a known intent, for mechanisms that accept creator attestations */
  creatorOf(intentHash: Bytes32): Address | undefined;
}

/**
 * A proving mechanism. Verification is pure: it never records anything.
 *
 * @throws {ProofError} when the evidence does not establish the claims
 */
export interface ProofVerifier<E extends ProofEvidence = ProofEvidence> {
  readonly mechanism: E["kind"];
  verify(evidence: E, context: VerificationContext): readonly VerifiedClaim[];
}

/**
 * Settlement-layer block hashes the source chain already trusts
 * (an L1 block oracle, a light client, a bridge checkpoint).
 */
export interface TrustedBlockHashes {
  isTrusted(chainId: ChainId, blockHash: Bytes32): boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type ProofErrorCode =
  | "INVALID_PROOF"
  | "UNKNOWN_PROVER"
  | "DUPLICATE_PROVER"
  | "UNAUTHORIZED_PROOF_SOURCE"
  | "UNSUPPORTED_DESTINATION"
  | "ARRAY_LENGTH_MISMATCH"
  | "ALREADY_CLAIMED"
  | "DESTINATION_MISMATCH";

export class ProofError extends Error {
  constructor(
    public readonly code: ProofErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ProofError";
  }
}
