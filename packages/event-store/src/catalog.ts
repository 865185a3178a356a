/**
 * Event catalog.
 *
 * Each settlement event type is registered once with a payload
 * validator; the store refuses payloads its validator rejects.
 */

import type { EventSource } from "@intentvault/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "intent.funded") */
  readonly type: string;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * @throws CatalogError if the type is already registered
   */
  register(schema: EventSchema): void {
    if (this._schemas.has(schema.type)) {
      throw new CatalogError(`Event type "${schema.type}" is already registered`);
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  /**
   * @returns false for unregistered types
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
