import type { DomainEvent, EventSource } from "@intentvault/types";

export const HASH_A =
  "0x1111111111111111111111111111111111111111111111111111111111111111";
export const HASH_B =
  "0x2222222222222222222222222222222222222222222222222222222222222222";
export const CREATOR = "0x00000000000000000000000000000000000000c1";
export const SOLVER = "0x00000000000000000000000000000000000000a1";
export const PROVER = "0x00000000000000000000000000000000000000b1";
export const USDC = "0x00000000000000000000000000000000000000d1";

export const FIXED_DATE = new Date("2026-01-01T00:00:00.000Z");

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  source: EventSource = "coordinator",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "test",
      correlationId: HASH_A,
      source,
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) =>
    makeEvent(`${prefix}.${i + 1}`),
  );
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
