/**
 * In-memory EventStore implementation.
 *
 * Stores events in plain arrays; all state is lost on process exit.
 */

import type { DomainEvent } from "@intentvault/types";
import type { EventCatalog } from "./catalog.js";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** When set, every appended payload must pass its schema's validator */
  readonly catalog?: EventCatalog;

  /** Source of `appendedAt`. Default: wall clock */
  readonly clock?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** All streams, in append order */
  private readonly _globalLog: StoredEvent[] = [];

  private _nextGlobalPosition = 1;

  private _lastHash: string = GENESIS_HASH;

  private readonly _catalog: EventCatalog | undefined;

  private readonly _clock: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._catalog = options.catalog;
    this._clock = options.clock ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    if (this._catalog !== undefined) {
      for (const event of events) {
        if (!this._catalog.validate(event.type, event.payload)) {
          throw new EventStoreError(
            "INVALID_EVENT",
            `Payload of "${event.type}" does not match its registered schema`,
            streamId,
          );
        }
      }
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const appendedAt = this._clock().toISOString();

    for (const [i, event] of events.entries()) {
      const base: UnhashedStoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const stored: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;

      stream.push(stored);
      this._globalLog.push(stored);
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const type = options?.type;

    const matching =
      type === undefined
        ? this._globalLog
        : this._globalLog.filter((e) => e.event.type === type);

    const result =
      options?.direction === "backward"
        ? matching.filter((e) => e.globalPosition <= fromPosition).reverse()
        : matching.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}

function limit(
  events: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0
    ? events.slice(0, maxCount)
    : events;
}
