/**
 * @intentvault/proof — Fulfillment proofs.
 *
 * Turns mechanism-specific evidence into verified
 * (intentHash, claimant, destination) claims, and keeps each
 * prover's record of what it has proven.
 *
 * @packageDocumentation
 */

// Types
export type {
  ProvingMechanism,
  FulfillmentProof,
  SelfEvidence,
  OutputRootPreimage,
  BedrockEvidence,
  CannonEvidence,
  NitroEvidence,
  HyperEvidence,
  ProofEvidence,
  VerifiedClaim,
  VerificationContext,
  ProofVerifier,
  TrustedBlockHashes,
  ProofErrorCode,
} from "./types.js";
export { ProofError } from "./types.js";

// Trie proofs
export type { RlpItem, AccountState } from "./trie.js";
export { EMPTY_TRIE_ROOT, verifyTrieProof, proveAccount, proveStorageSlot } from "./trie.js";

// Storage layout
export type { BlockHeader } from "./storage-layout.js";
export {
  slotKey,
  mappingSlot,
  arrayElementSlot,
  offsetSlot,
  wordToAddress,
  readPacked,
  computeOutputRoot,
  decodeBlockHeader,
} from "./storage-layout.js";

// Relay messages
export type { ProofMessage, RelayOptions } from "./hyper-message.js";
export {
  addressToBytes32,
  bytes32ToAddress,
  encodeProofMessage,
  decodeProofMessage,
  encodeRelayOptions,
  decodeRelayOptions,
} from "./hyper-message.js";

// Verifiers
export type { DestinationContracts } from "./verifiers/shared.js";
export type { SelfVerifierOptions } from "./verifiers/self.js";
export { createSelfVerifier } from "./verifiers/self.js";
export type { BedrockChain, BedrockVerifierOptions } from "./verifiers/bedrock.js";
export { createBedrockVerifier, DEFAULT_OUTPUTS_SLOT, DEFAULT_OUTPUT_ROOT_VERSION } from "./verifiers/bedrock.js";
export type { CannonChain, CannonVerifierOptions, GameId, GameStatusWord } from "./verifiers/cannon.js";
export {
  createCannonVerifier,
  decodeGameId,
  decodeGameStatus,
  GAME_STATUS,
  DEFAULT_FINALITY_DELAY_SECONDS,
} from "./verifiers/cannon.js";
export type { NitroChain, NitroVerifierOptions } from "./verifiers/nitro.js";
export { createNitroVerifier } from "./verifiers/nitro.js";
export type { HyperVerifierOptions } from "./verifiers/hyper.js";
export { createHyperVerifier } from "./verifiers/hyper.js";

// Registry
export type { ProvenIntent, ProofOutcome, RecordedProof, RegisteredProver } from "./prover-registry.js";
export { ProverRegistry, InMemoryTrustedBlockHashes } from "./prover-registry.js";
