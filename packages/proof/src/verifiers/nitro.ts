/**
 * Optimistic-rollup node proofs ("nitro").
 *
 * The settlement header proves the rollup's latest confirmed node and
 * the confirmData of the claimed node. confirmData commits to the
 * destination block hash and its send root (carried in extraData), so
 * the destination header, and its state root, are pinned.
 */

import { concat, keccak256, numberToHex, size } from "viem";
import type { Address, ChainId } from "@intentvault/types";
import type { NitroEvidence, ProofVerifier, TrustedBlockHashes } from "../types.js";
import { ProofError } from "../types.js";
import { proveAccount, proveStorageSlot } from "../trie.js";
import { decodeBlockHeader, mappingSlot, offsetSlot, readPacked, slotKey } from "../storage-layout.js";
import { proveFulfillments, resolveDestination, trustedHeader } from "./shared.js";

export interface NitroChain {
  readonly destination: ChainId;
  readonly rollup: Address;
  readonly inbox: Address;
}

export interface NitroVerifierOptions {
  readonly settlementChainId: ChainId;
  readonly trustedBlocks: TrustedBlockHashes;
  readonly chains: readonly NitroChain[];
  readonly fulfilledSlot: bigint;
  /** Slot holding the latest confirmed node number (uint64) */
  readonly latestConfirmedSlot: bigint;
  /** Bit offset of the node number within that slot. Default: 0 */
  readonly latestConfirmedOffset?: number | undefined;
  /** Slot of the nodes mapping */
  readonly nodesSlot: bigint;
  /** Offset of confirmData within a node struct */
  readonly confirmDataOffset: bigint;
}

export function createNitroVerifier(options: NitroVerifierOptions): ProofVerifier<NitroEvidence> {
  const latestConfirmedOffset = options.latestConfirmedOffset ?? 0;

  return {
    mechanism: "nitro",
    verify(evidence) {
      const chain = resolveDestination(options.chains, evidence.destination);
      const header = trustedHeader(options.trustedBlocks, options.settlementChainId, evidence.settlementHeader);
      const rollup = proveAccount(header.stateRoot, chain.rollup, evidence.rollupAccountProof);

      const latestConfirmed = readPacked(
        proveStorageSlot(rollup.storageRoot, slotKey(options.latestConfirmedSlot), evidence.latestConfirmedStorageProof),
        latestConfirmedOffset,
        64,
      );
      if (evidence.nodeNumber > latestConfirmed) {
        throw new ProofError(
          "INVALID_PROOF",
          `Node ${evidence.nodeNumber} is not confirmed (latest confirmed: ${latestConfirmed})`,
        );
      }

      const confirmData = proveStorageSlot(
        rollup.storageRoot,
        offsetSlot(mappingSlot(numberToHex(evidence.nodeNumber, { size: 32 }), options.nodesSlot), options.confirmDataOffset),
        evidence.confirmDataStorageProof,
      );

      const destinationHeader = decodeBlockHeader(evidence.destinationHeader);
      if (size(destinationHeader.extraData) !== 32) {
        throw new ProofError("INVALID_PROOF", "Destination header extraData is not a 32-byte send root");
      }
      if (confirmData !== keccak256(concat([destinationHeader.hash, destinationHeader.extraData]))) {
        throw new ProofError("INVALID_PROOF", `Node ${evidence.nodeNumber} does not confirm the given block`);
      }

      return proveFulfillments(
        destinationHeader.stateRoot,
        chain.inbox,
        options.fulfilledSlot,
        evidence.inboxAccountProof,
        evidence.fulfillments,
        evidence.destination,
      );
    },
  };
}
