/**
 * Tests for EventCatalog registration and validation.
 */

import { describe, it, expect } from "vitest";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import type { EventSchema } from "../src/catalog.js";
import { thrown } from "./fixtures.js";

const noted: EventSchema = {
  type: "intent.noted",
  description: "test event",
  source: "coordinator",
  validate: (p) => typeof p === "object" && p !== null && "note" in p,
};

describe("EventCatalog", () => {
  it("registers and lists schemas", () => {
    const catalog = new EventCatalog();
    catalog.register(noted);
    catalog.register({ ...noted, type: "intent.archived", source: "funding" });

    expect(catalog.size).toBe(2);
    expect(catalog.listTypes()).toEqual(["intent.archived", "intent.noted"]);
    expect(catalog.getSchema("intent.archived")?.source).toBe("funding");
    expect(catalog.has("intent.noted")).toBe(true);
  });

  it("validates payloads against the registered schema", () => {
    const catalog = new EventCatalog();
    catalog.register(noted);

    expect(catalog.validate("intent.noted", { note: "x" })).toBe(true);
    expect(catalog.validate("intent.noted", {})).toBe(false);
    expect(catalog.validate("intent.unknown", { note: "x" })).toBe(false);
  });

  it("refuses a second schema for the same type", () => {
    const catalog = new EventCatalog();
    catalog.register(noted);

    const error = thrown(() => catalog.register({ ...noted, description: "again" }));

    expect(error).toBeInstanceOf(CatalogError);
    expect(error).toMatchObject({ message: 'Event type "intent.noted" is already registered' });
    expect(catalog.getSchema("intent.noted")?.description).toBe("test event");
  });
});
