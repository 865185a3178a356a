/**
 * Self-attestation: a trusted attester, or the intent's own creator,
 * vouches for fulfillment directly. Weakest trust, fastest settlement.
 */

import { isAddressEqual } from "viem";
import type { Address } from "@intentvault/types";
import type { ProofVerifier, SelfEvidence } from "../types.js";
import { ProofError } from "../types.js";

export interface SelfVerifierOptions {
  readonly attesters: readonly Address[];
  /** Accept the intent's creator as an attester. Default: true */
  readonly allowCreator?: boolean | undefined;
}

export function createSelfVerifier(options: SelfVerifierOptions): ProofVerifier<SelfEvidence> {
  const allowCreator = options.allowCreator ?? true;

  return {
    mechanism: "self",
    verify(evidence, context) {
      const trusted = options.attesters.some((a) => isAddressEqual(a, evidence.attester));

      return evidence.claims.map((claim) => {
        const creator = allowCreator ? context.creatorOf(claim.intentHash) : undefined;
        const isCreator = creator !== undefined && isAddressEqual(creator, evidence.attester);
        if (!trusted && !isCreator) {
          throw new ProofError(
            "UNAUTHORIZED_PROOF_SOURCE",
            `${evidence.attester} may not attest intent ${claim.intentHash}`,
          );
        }
        return { intentHash: claim.intentHash, claimant: claim.claimant, destination: evidence.destination };
      });
    },
  };
}
