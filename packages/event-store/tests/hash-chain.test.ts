/**
 * Tests for the tamper-evident hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";
import { FIXED_DATE, makeEvent, makeEvents } from "./fixtures.js";

function unhashed(payload: Record<string, unknown> = {}): UnhashedStoredEvent {
  return {
    event: makeEvent("test", payload),
    streamId: "s",
    version: 1,
    globalPosition: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

function storeWith(count: number): InMemoryEventStore {
  const store = new InMemoryEventStore({ clock: () => FIXED_DATE });
  store.append("s", makeEvents(count));
  return store;
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(unhashed(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order in the payload", () => {
    const event = unhashed({ a: 1, b: 2 });
    const reordered = { ...event, event: { ...event.event, payload: { b: 2, a: 1 } } };

    expect(computeEventHash(reordered, GENESIS_HASH)).toBe(
      computeEventHash(event, GENESIS_HASH),
    );
  });

  it("changes with the payload and with the previous hash", () => {
    const base = computeEventHash(unhashed({ x: 1 }), GENESIS_HASH);

    expect(computeEventHash(unhashed({ x: 2 }), GENESIS_HASH)).not.toBe(base);
    expect(computeEventHash(unhashed({ x: 1 }), "other")).not.toBe(base);
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("links the first event to genesis and each later event to its predecessor", () => {
    const events = storeWith(3).readAll();

    expect(events[0]?.previousHash).toBe(GENESIS_HASH);
    expect(events[1]?.previousHash).toBe(events[0]?.hash);
    expect(events[2]?.previousHash).toBe(events[1]?.hash);
    expect(verifyHashChain(events)).toEqual({
      valid: true,
      lastVerifiedPosition: 3,
      errors: [],
    });
  });

  it("detects a modified payload at its position", () => {
    const events = storeWith(3).readAll();
    const tampered: StoredEvent[] = events.map((e) =>
      e.globalPosition === 2
        ? { ...e, event: { ...e.event, payload: { forged: true } } }
        : e,
    );

    const result = verifyHashChain(tampered);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a removed event", () => {
    const events = storeWith(3).readAll();

    const result = verifyHashChain([events[0], events[2]].filter((e): e is StoredEvent => e !== undefined));

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("holds for any sequence of appends, and breaks when any event but the head is dropped", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 1, max: 4 }), { minLength: 2, maxLength: 6 }),
        fc.nat(),
        (batches, pick) => {
          const store = new InMemoryEventStore();
          batches.forEach((size, i) => store.append(`s-${i % 2}`, makeEvents(size)));

          const events = store.readAll();
          const dropped = pick % (events.length - 1);

          expect(store.verifyIntegrity().valid).toBe(true);
          expect(
            verifyHashChain(events.filter((_, i) => i !== dropped)).valid,
          ).toBe(false);
        },
      ),
      { numRuns: 50 },
    );
  });
});
