/**
 * Steps shared by the storage-proof mechanisms (bedrock, cannon, nitro).
 */

import { getAddress, isAddressEqual, zeroAddress } from "viem";
import type { Address, ChainId, Hex } from "@intentvault/types";
import type { FulfillmentProof, TrustedBlockHashes, VerifiedClaim } from "../types.js";
import { ProofError } from "../types.js";
import { proveAccount, proveStorageSlot } from "../trie.js";
import { decodeBlockHeader, mappingSlot, wordToAddress } from "../storage-layout.js";
import type { BlockHeader } from "../storage-layout.js";

/**
 * Per-destination contract addresses. `inbox` is the destination
 * contract whose `fulfilled` mapping records the claimant per intent.
 */
export interface DestinationContracts {
  readonly destination: ChainId;
  readonly inbox: Address;
}

export function resolveDestination<C extends DestinationContracts>(
  chains: readonly C[],
  destination: ChainId,
): C {
  const chain = chains.find((c) => c.destination === destination);
  if (chain === undefined) {
    throw new ProofError("UNSUPPORTED_DESTINATION", `No contracts configured for chain ${destination}`);
  }
  return chain;
}

/**
 * Decode a settlement-layer header and require that its hash is trusted.
 */
export function trustedHeader(
  trustedBlocks: TrustedBlockHashes,
  settlementChainId: ChainId,
  rlpHeader: Hex,
): BlockHeader {
  const header = decodeBlockHeader(rlpHeader);
  if (!trustedBlocks.isTrusted(settlementChainId, header.hash)) {
    throw new ProofError(
      "INVALID_PROOF",
      `Block ${header.hash} is not a trusted block of chain ${settlementChainId}`,
    );
  }
  return header;
}

/**
 * Prove `fulfilled[intentHash] == claimant` on the destination inbox for
 * every fulfillment, under the destination's state root.
 */
export function proveFulfillments(
  stateRoot: Hex,
  inbox: Address,
  fulfilledSlot: bigint,
  inboxAccountProof: readonly Hex[],
  fulfillments: readonly FulfillmentProof[],
  destination: ChainId,
): VerifiedClaim[] {
  const account = proveAccount(stateRoot, inbox, inboxAccountProof);

  return fulfillments.map((f) => {
    const word = proveStorageSlot(account.storageRoot, mappingSlot(f.intentHash, fulfilledSlot), f.storageProof);
    const recorded = wordToAddress(word);
    if (isAddressEqual(recorded, zeroAddress)) {
      throw new ProofError("INVALID_PROOF", `Intent ${f.intentHash} is not fulfilled on chain ${destination}`);
    }
    if (!isAddressEqual(recorded, f.claimant)) {
      throw new ProofError(
        "INVALID_PROOF",
        `Intent ${f.intentHash} was fulfilled by ${recorded}, not ${getAddress(f.claimant)}`,
      );
    }
    return { intentHash: f.intentHash, claimant: recorded, destination };
  });
}
