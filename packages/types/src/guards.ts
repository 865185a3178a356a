/**
 * Runtime Type Guards
 *
 * Narrowing functions for settlement domain types.
 * Used at system boundaries (API inputs, relayed messages,
 * deserialized events) before a value reaches the hasher.
 */

import type { Address, Bytes32, Hex } from "./primitives.js";
import { UINT256_MAX, UINT64_MAX } from "./primitives.js";
import type { Call, Intent, Reward, Route, TokenAmount } from "./intent.js";
import type { ClaimStatus } from "./claim.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Primitive guards
// =============================================================================

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

export function isUint64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= UINT64_MAX;
}

export function isUint256(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= UINT256_MAX;
}

// =============================================================================
// Intent guards
// =============================================================================

export function isTokenAmount(value: unknown): value is TokenAmount {
  if (!isRecord(value)) return false;
  return isAddress(value.token) && isUint256(value.amount);
}

export function isCall(value: unknown): value is Call {
  if (!isRecord(value)) return false;
  return isAddress(value.target) && isHex(value.data) && isUint256(value.value);
}

export function isRoute(value: unknown): value is Route {
  if (!isRecord(value)) return false;
  return (
    isBytes32(value.salt) &&
    isUint64(value.deadline) &&
    isAddress(value.portal) &&
    isUint256(value.nativeAmount) &&
    Array.isArray(value.tokens) &&
    value.tokens.every(isTokenAmount) &&
    Array.isArray(value.calls) &&
    value.calls.every(isCall)
  );
}

export function isReward(value: unknown): value is Reward {
  if (!isRecord(value)) return false;
  return (
    isUint64(value.deadline) &&
    isAddress(value.creator) &&
    isAddress(value.prover) &&
    isUint256(value.nativeAmount) &&
    Array.isArray(value.tokens) &&
    value.tokens.every(isTokenAmount)
  );
}

export function isIntent(value: unknown): value is Intent {
  if (!isRecord(value)) return false;
  return isUint64(value.destination) && isRoute(value.route) && isReward(value.reward);
}

// =============================================================================
// Claim guards
// =============================================================================

const CLAIM_STATUSES = new Set<string>(["initiated", "claimed", "refunded"]);

export function isClaimStatus(value: unknown): value is ClaimStatus {
  return typeof value === "string" && CLAIM_STATUSES.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["funding", "proof", "distribution", "coordinator"]);

function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source) &&
    (value.causationId === undefined || typeof value.causationId === "string")
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    value.type.length > 0 &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
