/**
 * Tests for the notification log route.
 *
 * Covers: global order, cursor pagination, type and intent filters.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { hashIntent } from "@intentvault/encoding";
import { INTENT_EVENTS } from "@intentvault/event-store";
import { encodeCursor } from "../src/types/pagination.js";
import {
  CREATOR,
  SELF_PROVER,
  createTestWorld,
  fundAccount,
  jsonRequest,
  makeIntent,
  selfProof,
} from "./setup.js";
import type { TestWorld } from "./setup.js";

interface EventsBody {
  data: { globalPosition: number; streamId: string; event: { type: string } }[];
  pagination: { cursor: string | null; hasMore: boolean };
}

let world: TestWorld;

const intent = makeIntent();
const { intentHash } = hashIntent(intent);

beforeEach(() => {
  world = createTestWorld();
  fundAccount(world.ledger);
  world.service.publishAndFundFor(intent, CREATOR);
  world.service.relayProof(SELF_PROVER, selfProof(intentHash));
});

async function list(query: string = ""): Promise<EventsBody> {
  const res = await world.app.request(jsonRequest(`/api/v1/events${query}`));
  expect(res.status).toBe(200);
  return (await res.json()) as EventsBody;
}

describe("GET /api/v1/events", () => {
  it("lists every event in global order", async () => {
    const body = await list();

    expect(body.data.map((e) => e.event.type)).toEqual([
      INTENT_EVENTS.PUBLISHED,
      INTENT_EVENTS.FUNDED,
      INTENT_EVENTS.PROVEN,
    ]);
    expect(body.data.map((e) => e.globalPosition)).toEqual([1, 2, 3]);
    expect(body.data[0]?.streamId).toBe(`intent:${intentHash}`);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("pages with a cursor", async () => {
    const first = await list("?limit=2");

    expect(first.data.map((e) => e.globalPosition)).toEqual([1, 2]);
    expect(first.pagination).toEqual({
      cursor: encodeCursor("globalPosition", "0000000000000002"),
      hasMore: true,
    });

    const second = await list(`?limit=2&cursor=${first.pagination.cursor ?? ""}`);
    expect(second.data.map((e) => e.globalPosition)).toEqual([3]);
    expect(second.pagination.hasMore).toBe(false);
  });

  it("starts after a position", async () => {
    const body = await list("?afterPosition=1");
    expect(body.data.map((e) => e.globalPosition)).toEqual([2, 3]);
  });

  it("filters by type", async () => {
    const body = await list(`?type=${INTENT_EVENTS.PROVEN}`);
    expect(body.data.map((e) => e.globalPosition)).toEqual([3]);
  });

  it("filters by intent", async () => {
    const other = `0x${"ab".repeat(32)}`;

    expect((await list(`?intentHash=${intentHash}`)).data).toHaveLength(3);
    expect((await list(`?intentHash=${other}`)).data).toEqual([]);
  });

  it("returns 400 for a limit out of range", async () => {
    const res = await world.app.request(jsonRequest("/api/v1/events?limit=0"));
    expect(res.status).toBe(400);
  });
});
