/**
 * Fault-dispute-game proofs ("cannon").
 *
 * The settlement header proves the dispute game factory's game list;
 * the listed game must have resolved in the defender's favour and be
 * past the finality delay. Its root claim is the destination's output
 * root, which commits to the state root the inbox is proven under.
 */

import { isAddressEqual, zeroAddress } from "viem";
import type { Address, Bytes32, ChainId } from "@intentvault/types";
import type { CannonEvidence, ProofVerifier, TrustedBlockHashes } from "../types.js";
import { ProofError } from "../types.js";
import { proveAccount, proveStorageSlot } from "../trie.js";
import { arrayElementSlot, computeOutputRoot, readPacked, slotKey, wordToAddress } from "../storage-layout.js";
import { proveFulfillments, resolveDestination, trustedHeader } from "./shared.js";
import { DEFAULT_OUTPUT_ROOT_VERSION } from "./bedrock.js";

export const GAME_STATUS = {
  IN_PROGRESS: 0n,
  CHALLENGER_WINS: 1n,
  DEFENDER_WINS: 2n,
} as const;

/** 3.5 days */
export const DEFAULT_FINALITY_DELAY_SECONDS = 302_400n;

export interface CannonChain {
  readonly destination: ChainId;
  readonly disputeGameFactory: Address;
  readonly inbox: Address;
}

export interface CannonVerifierOptions {
  readonly settlementChainId: ChainId;
  readonly trustedBlocks: TrustedBlockHashes;
  readonly chains: readonly CannonChain[];
  readonly fulfilledSlot: bigint;
  /** Slot of the factory's game list */
  readonly gameListSlot: bigint;
  /** Slot of the game's root claim */
  readonly rootClaimSlot: bigint;
  /** Slot packing createdAt, resolvedAt and status. Default: 0 */
  readonly gameStatusSlot?: bigint | undefined;
  /** Accepted game type. Default: 0 */
  readonly gameType?: bigint | undefined;
  readonly finalityDelaySeconds?: bigint | undefined;
  readonly outputRootVersion?: Bytes32 | undefined;
}

export interface GameStatusWord {
  readonly createdAt: bigint;
  readonly resolvedAt: bigint;
  readonly status: bigint;
}

export function decodeGameStatus(word: Bytes32): GameStatusWord {
  return {
    createdAt: readPacked(word, 0, 64),
    resolvedAt: readPacked(word, 64, 64),
    status: readPacked(word, 128, 8),
  };
}

export interface GameId {
  readonly gameType: bigint;
  readonly timestamp: bigint;
  readonly proxy: Address;
}

/**
 * gameType (uint32) ‖ timestamp (uint64) ‖ proxy (address)
 */
export function decodeGameId(word: Bytes32): GameId {
  return {
    gameType: readPacked(word, 224, 32),
    timestamp: readPacked(word, 160, 64),
    proxy: wordToAddress(word),
  };
}

export function createCannonVerifier(options: CannonVerifierOptions): ProofVerifier<CannonEvidence> {
  const gameStatusSlot = options.gameStatusSlot ?? 0n;
  const gameType = options.gameType ?? 0n;
  const finalityDelay = options.finalityDelaySeconds ?? DEFAULT_FINALITY_DELAY_SECONDS;
  const version = (options.outputRootVersion ?? DEFAULT_OUTPUT_ROOT_VERSION).toLowerCase();

  return {
    mechanism: "cannon",
    verify(evidence, context) {
      const chain = resolveDestination(options.chains, evidence.destination);
      const header = trustedHeader(options.trustedBlocks, options.settlementChainId, evidence.settlementHeader);

      if (evidence.output.version.toLowerCase() !== version) {
        throw new ProofError("INVALID_PROOF", `Unsupported output root version ${evidence.output.version}`);
      }

      // ─── Game lookup ───
      const factory = proveAccount(header.stateRoot, chain.disputeGameFactory, evidence.factoryAccountProof);
      const gameId = decodeGameId(
        proveStorageSlot(
          factory.storageRoot,
          arrayElementSlot(options.gameListSlot, evidence.gameIndex),
          evidence.gameListStorageProof,
        ),
      );
      if (gameId.gameType !== gameType) {
        throw new ProofError("INVALID_PROOF", `Game ${evidence.gameIndex} has type ${gameId.gameType}, expected ${gameType}`);
      }
      if (isAddressEqual(gameId.proxy, zeroAddress)) {
        throw new ProofError("INVALID_PROOF", `Game ${evidence.gameIndex} does not exist`);
      }

      // ─── Resolution ───
      const game = proveAccount(header.stateRoot, gameId.proxy, evidence.gameAccountProof);
      const status = decodeGameStatus(
        proveStorageSlot(game.storageRoot, slotKey(gameStatusSlot), evidence.gameStatusStorageProof),
      );
      if (status.status !== GAME_STATUS.DEFENDER_WINS) {
        throw new ProofError("INVALID_PROOF", `Game ${gameId.proxy} has not resolved for the defender`);
      }
      if (status.resolvedAt + finalityDelay > context.now) {
        throw new ProofError(
          "INVALID_PROOF",
          `Game ${gameId.proxy} is final at ${status.resolvedAt + finalityDelay}, now is ${context.now}`,
        );
      }

      // ─── Root claim ───
      const rootClaim = proveStorageSlot(
        game.storageRoot,
        slotKey(options.rootClaimSlot),
        evidence.rootClaimStorageProof,
      );
      if (rootClaim !== computeOutputRoot(evidence.output)) {
        throw new ProofError("INVALID_PROOF", `Root claim of ${gameId.proxy} does not match the given output`);
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
