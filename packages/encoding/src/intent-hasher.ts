/**
 * Intent Hasher — Canonical encoding and hashing of intents.
 *
 *   routeHash  = keccak256(abi.encode(Route))
 *   rewardHash = keccak256(abi.encode(Reward))
 *   intentHash = keccak256(abi.encodePacked(uint64 destination, routeHash, rewardHash))
 *
 * Arrays are encoded element by element, so reordering tokens or calls
 * changes the hash. Identical content always yields the same intentHash,
 * which makes it the deduplication key for the whole system.
 */

import { encodeAbiParameters, encodePacked, keccak256 } from "viem";
import type {
  Address,
  Bytes32,
  ChainId,
  Hex,
  Intent,
  IntentHashes,
  Reward,
  Route,
  TokenAmount,
} from "@intentvault/types";
import { isIntent } from "@intentvault/types";
import { EncodingError } from "./errors.js";

// =============================================================================
// ABI Layouts
// =============================================================================

const TOKEN_AMOUNT_COMPONENTS = [
  { name: "token", type: "address" },
  { name: "amount", type: "uint256" },
] as const;

export const ROUTE_ABI = [
  {
    type: "tuple",
    components: [
      { name: "salt", type: "bytes32" },
      { name: "deadline", type: "uint64" },
      { name: "portal", type: "address" },
      { name: "nativeAmount", type: "uint256" },
      { name: "tokens", type: "tuple[]", components: TOKEN_AMOUNT_COMPONENTS },
      {
        name: "calls",
        type: "tuple[]",
        components: [
          { name: "target", type: "address" },
          { name: "data", type: "bytes" },
          { name: "value", type: "uint256" },
        ],
      },
    ],
  },
] as const;

export const REWARD_ABI = [
  {
    type: "tuple",
    components: [
      { name: "deadline", type: "uint64" },
      { name: "creator", type: "address" },
      { name: "prover", type: "address" },
      { name: "nativeAmount", type: "uint256" },
      { name: "tokens", type: "tuple[]", components: TOKEN_AMOUNT_COMPONENTS },
    ],
  },
] as const;

// =============================================================================
// Encoding
// =============================================================================

export function encodeRoute(route: Route): Hex {
  return encodeAbiParameters(ROUTE_ABI, [route]);
}

export function encodeReward(reward: Reward): Hex {
  return encodeAbiParameters(REWARD_ABI, [reward]);
}

// =============================================================================
// Hashing
// =============================================================================

export function hashRoute(route: Route): Bytes32 {
  return keccak256(encodeRoute(route));
}

export function hashReward(reward: Reward): Bytes32 {
  return keccak256(encodeReward(reward));
}

/**
 * Combine the destination chain with the two half-hashes.
 *
 * Callers that only hold a routeHash (solvers relaying a fulfilled route,
 * funders who never saw the calls) use this directly.
 */
export function computeIntentHash(
  destination: ChainId,
  routeHash: Bytes32,
  rewardHash: Bytes32,
): Bytes32 {
  return keccak256(
    encodePacked(["uint64", "bytes32", "bytes32"], [destination, routeHash, rewardHash]),
  );
}

export function hashIntent(intent: Intent): IntentHashes {
  const routeHash = hashRoute(intent.route);
  const rewardHash = hashReward(intent.reward);
  return {
    intentHash: computeIntentHash(intent.destination, routeHash, rewardHash),
    routeHash,
    rewardHash,
  };
}

// =============================================================================
// Input checks
// =============================================================================

/**
 * Build a TokenAmount sequence from parallel arrays.
 *
 * @throws {EncodingError} ARRAY_LENGTH_MISMATCH when the arrays differ in length
 */
export function zipTokenAmounts(
  tokens: readonly Address[],
  amounts: readonly bigint[],
): TokenAmount[] {
  if (tokens.length !== amounts.length) {
    throw new EncodingError(
      "ARRAY_LENGTH_MISMATCH",
      `Got ${tokens.length} tokens but ${amounts.length} amounts`,
    );
  }
  return tokens.map((token, i) => ({ token, amount: amounts[i] ?? 0n }));
}

/**
 * Reject values that the ABI encoder would either throw on or silently
 * truncate (negative amounts, over-width integers, malformed hex).
 */
export function assertIntent(value: unknown): asserts value is Intent {
  if (!isIntent(value)) {
    throw new EncodingError("INVALID_INTENT", "Intent is malformed");
  }
}
