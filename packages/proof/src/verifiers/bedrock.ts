/**
 * Rollup-output proofs ("bedrock").
 *
 * settlement header (trusted)
 *   └─ output oracle account
 *        └─ l2Outputs[index].outputRoot
 *             = keccak256(version ‖ stateRoot ‖ messagePasserRoot ‖ blockHash)
 *                  └─ inbox account under stateRoot
 *                       └─ fulfilled[intentHash] == claimant
 */

import type { Address, Bytes32, ChainId } from "@intentvault/types";
import type { BedrockEvidence, ProofVerifier, TrustedBlockHashes } from "../types.js";
import { ProofError } from "../types.js";
import { proveAccount, proveStorageSlot } from "../trie.js";
import { arrayElementSlot, computeOutputRoot } from "../storage-layout.js";
import { proveFulfillments, resolveDestination, trustedHeader } from "./shared.js";

export const DEFAULT_OUTPUTS_SLOT = 3n;
export const DEFAULT_OUTPUT_ROOT_VERSION: Bytes32 =
  "0x0000000000000000000000000000000000000000000000000000000000000000";

export interface BedrockChain {
  readonly destination: ChainId;
  readonly outputOracle: Address;
  readonly inbox: Address;
}

export interface BedrockVerifierOptions {
  readonly settlementChainId: ChainId;
  readonly trustedBlocks: TrustedBlockHashes;
  readonly chains: readonly BedrockChain[];
  readonly fulfilledSlot: bigint;
  /** Slot of the `l2Outputs` array. Default: 3 */
  readonly outputsSlot?: bigint | undefined;
  readonly outputRootVersion?: Bytes32 | undefined;
}

export function createBedrockVerifier(options: BedrockVerifierOptions): ProofVerifier<BedrockEvidence> {
  const outputsSlot = options.outputsSlot ?? DEFAULT_OUTPUTS_SLOT;
  const version = (options.outputRootVersion ?? DEFAULT_OUTPUT_ROOT_VERSION).toLowerCase();

  return {
    mechanism: "bedrock",
    verify(evidence) {
      const chain = resolveDestination(options.chains, evidence.destination);
      const header = trustedHeader(options.trustedBlocks, options.settlementChainId, evidence.settlementHeader);

      if (evidence.output.version.toLowerCase() !== version) {
        throw new ProofError("INVALID_PROOF", `Unsupported output root version ${evidence.output.version}`);
      }

      const oracle = proveAccount(header.stateRoot, chain.outputOracle, evidence.outputOracleAccountProof);
      // Each output proposal spans two slots: outputRoot, then (timestamp, l2BlockNumber)
      const stored = proveStorageSlot(
        oracle.storageRoot,
        arrayElementSlot(outputsSlot, evidence.outputIndex, 2n),
        evidence.outputRootStorageProof,
      );
      if (stored !== computeOutputRoot(evidence.output)) {
        throw new ProofError("INVALID_PROOF", `Output ${evidence.outputIndex} does not match the given preimage`);
      }

      return proveFulfillments(
        evidence.output.stateRoot,
        chain.inbox,
        options.fulfilledSlot,
        evidence.inboxAccountProof,
        evidence.fulfillments,
        evidence.destination,
      );
    },
  };
}
