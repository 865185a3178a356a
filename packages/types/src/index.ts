/**
 * @intentvault/types — Shared domain types for the settlement core.
 *
 * These types are used across all packages:
 * - Intents (Route, Reward, hashes)
 * - Claim state
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Quantities and timestamps are bigint, never number
 */

// Primitives
export type { Hex, Address, Bytes32, Timestamp, ChainId } from "./primitives.js";
export { NATIVE_ASSET, UINT64_MAX, UINT256_MAX } from "./primitives.js";

// Intent types
export type {
  TokenAmount,
  Call,
  Route,
  Reward,
  Intent,
  IntentHashes,
} from "./intent.js";

// Claim types
export type { ClaimStatus, ClaimState, FundingStatus } from "./claim.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isHex,
  isAddress,
  isBytes32,
  isUint64,
  isUint256,
  isTokenAmount,
  isCall,
  isRoute,
  isReward,
  isIntent,
  isClaimStatus,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
