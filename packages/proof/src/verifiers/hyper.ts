/**
 * Message-relay proofs ("hyperProver").
 *
 * The destination prover sends (intentHashes, claimants) through the
 * relay network; the source side accepts the message only from the
 * mailbox, and only from a whitelisted sender.
 */

import { isAddressEqual, zeroAddress } from "viem";
import type { Address, Bytes32 } from "@intentvault/types";
import type { HyperEvidence, ProofVerifier, VerifiedClaim } from "../types.js";
import { ProofError } from "../types.js";
import { decodeProofMessage } from "../hyper-message.js";

export interface HyperVerifierOptions {
  readonly mailbox: Address;
  /** Senders allowed to deliver proofs, as bytes32 */
  readonly whitelist: readonly Bytes32[];
}

export function createHyperVerifier(options: HyperVerifierOptions): ProofVerifier<HyperEvidence> {
  const whitelist = new Set(options.whitelist.map((s) => s.toLowerCase()));

  return {
    mechanism: "hyperProver",
    verify(evidence) {
      if (!isAddressEqual(evidence.caller, options.mailbox)) {
        throw new ProofError("UNAUTHORIZED_PROOF_SOURCE", `${evidence.caller} is not the mailbox`);
      }
      if (!whitelist.has(evidence.sender.toLowerCase())) {
        throw new ProofError("UNAUTHORIZED_PROOF_SOURCE", `Sender ${evidence.sender} is not whitelisted`);
      }

      const message = decodeProofMessage(evidence.body);
      const claims: VerifiedClaim[] = [];
      for (const [i, intentHash] of message.intentHashes.entries()) {
        const claimant = message.claimants[i];
        // Unfulfilled entries carry a zero claimant
        if (claimant === undefined || isAddressEqual(claimant, zeroAddress)) continue;
        claims.push({ intentHash, claimant, destination: evidence.origin });
      }
      return claims;
    },
  };
}
