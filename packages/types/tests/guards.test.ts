/**
 * Runtime type guard tests for @intentvault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
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
} from "../src/guards.js";
import { UINT256_MAX, UINT64_MAX } from "../src/primitives.js";

const TOKEN = "0x1111111111111111111111111111111111111111";
const CREATOR = "0x2222222222222222222222222222222222222222";
const PROVER = "0x3333333333333333333333333333333333333333";
const SALT = `0x${"ab".repeat(32)}`;

const validRoute = {
  salt: SALT,
  deadline: 1_700_003_600n,
  portal: "0x4444444444444444444444444444444444444444",
  nativeAmount: 0n,
  tokens: [{ token: TOKEN, amount: 1000n }],
  calls: [{ target: TOKEN, data: "0xa9059cbb", value: 0n }],
};

const validReward = {
  deadline: 1_700_003_600n,
  creator: CREATOR,
  prover: PROVER,
  nativeAmount: 1n,
  tokens: [{ token: TOKEN, amount: 1001n }],
};

// =============================================================================
// Primitive guards
// =============================================================================

describe("isHex", () => {
  it("accepts empty and even-length hex", () => {
    expect(isHex("0x")).toBe(true);
    expect(isHex("0xdeadBEEF")).toBe(true);
  });

  it("rejects odd length and missing prefix", () => {
    expect(isHex("0xabc")).toBe(false);
    expect(isHex("deadbeef")).toBe(false);
    expect(isHex(42)).toBe(false);
  });
});

describe("isAddress / isBytes32", () => {
  it("checks exact width", () => {
    expect(isAddress(TOKEN)).toBe(true);
    expect(isAddress(`${TOKEN}00`)).toBe(false);
    expect(isBytes32(SALT)).toBe(true);
    expect(isBytes32(TOKEN)).toBe(false);
  });
});

describe("unsigned integer guards", () => {
  it("bounds uint64", () => {
    expect(isUint64(0n)).toBe(true);
    expect(isUint64(UINT64_MAX)).toBe(true);
    expect(isUint64(UINT64_MAX + 1n)).toBe(false);
    expect(isUint64(-1n)).toBe(false);
  });

  it("bounds uint256 and rejects numbers", () => {
    expect(isUint256(UINT256_MAX)).toBe(true);
    expect(isUint256(UINT256_MAX + 1n)).toBe(false);
    expect(isUint256(5)).toBe(false);
  });
});

// =============================================================================
// Intent guards
// =============================================================================

describe("isTokenAmount / isCall", () => {
  it("accepts well-formed values", () => {
    expect(isTokenAmount({ token: TOKEN, amount: 0n })).toBe(true);
    expect(isCall({ target: TOKEN, data: "0x", value: 0n })).toBe(true);
  });

  it("rejects negative amounts and string amounts", () => {
    expect(isTokenAmount({ token: TOKEN, amount: -1n })).toBe(false);
    expect(isTokenAmount({ token: TOKEN, amount: "1000" })).toBe(false);
  });

  it("rejects arrays and null", () => {
    expect(isCall(null)).toBe(false);
    expect(isCall([TOKEN, "0x", 0n])).toBe(false);
  });
});

describe("isRoute", () => {
  it("accepts a valid route", () => {
    expect(isRoute(validRoute)).toBe(true);
  });

  it("rejects a malformed nested call", () => {
    expect(isRoute({ ...validRoute, calls: [{ target: TOKEN, data: "0x1", value: 0n }] })).toBe(false);
  });

  it("rejects a short salt", () => {
    expect(isRoute({ ...validRoute, salt: "0x01" })).toBe(false);
  });
});

describe("isReward", () => {
  it("accepts a valid reward", () => {
    expect(isReward(validReward)).toBe(true);
  });

  it("rejects a deadline beyond uint64", () => {
    expect(isReward({ ...validReward, deadline: UINT64_MAX + 1n })).toBe(false);
  });

  it("rejects a missing prover", () => {
    const { prover: _prover, ...rest } = validReward;
    expect(isReward(rest)).toBe(false);
  });
});

describe("isIntent", () => {
  it("accepts a complete intent", () => {
    expect(isIntent({ destination: 10n, route: validRoute, reward: validReward })).toBe(true);
  });

  it("rejects a numeric destination", () => {
    expect(isIntent({ destination: 10, route: validRoute, reward: validReward })).toBe(false);
  });
});

// =============================================================================
// Claim & event guards
// =============================================================================

describe("isClaimStatus", () => {
  it("accepts the three statuses only", () => {
    expect(isClaimStatus("initiated")).toBe(true);
    expect(isClaimStatus("claimed")).toBe(true);
    expect(isClaimStatus("refunded")).toBe(true);
    expect(isClaimStatus("withdrawn")).toBe(false);
  });
});

describe("isDomainEvent", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2026-01-01T00:00:00.000Z",
    actor: "coordinator",
    correlationId: SALT,
    source: "funding",
  };

  it("accepts a valid event", () => {
    expect(isEventMetadata(metadata)).toBe(true);
    expect(isDomainEvent({ type: "intent.funded", metadata, payload: {} })).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "observer" })).toBe(false);
  });

  it("rejects an empty type and a non-object payload", () => {
    expect(isDomainEvent({ type: "", metadata, payload: {} })).toBe(false);
    expect(isDomainEvent({ type: "intent.funded", metadata, payload: [] })).toBe(false);
  });
});
