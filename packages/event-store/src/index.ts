/**
 * @intentvault/event-store — Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, hash-chained for tamper evidence
 * - EventCatalog for payload validation
 * - The settlement event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Settlement events
export {
  INTENT_EVENTS,
  intentStream,
  createIntentCatalog,
} from "./intent-events.js";
export type {
  IntentEventType,
  TokenAmountPayload,
  IntentPublishedPayload,
  IntentFundedPayload,
  IntentProvenPayload,
  IntentWithdrawnPayload,
  IntentRefundedPayload,
  TokenRecoveredPayload,
} from "./intent-events.js";
