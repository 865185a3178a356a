/**
 * Settlement domain events.
 *
 * Naming convention: `intent.<action>`. Every event of one intent is
 * appended to the stream returned by {@link intentStream}. Amounts are
 * decimal strings so payloads stay plain JSON.
 */

import type { Bytes32 } from "@intentvault/types";
import { isAddress, isBytes32 } from "@intentvault/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export interface TokenAmountPayload {
  readonly token: string;
  readonly amount: string;
}

export interface IntentPublishedPayload {
  readonly intentHash: string;
  readonly destination: string;
  readonly creator: string;
  readonly prover: string;
  readonly deadline: string;
  readonly nativeAmount: string;
  readonly tokens: readonly TokenAmountPayload[];
}

export interface IntentFundedPayload {
  readonly intentHash: string;
  readonly funder: string;
  readonly complete: boolean;
}

export interface IntentProvenPayload {
  readonly intentHash: string;
  readonly claimant: string;
  readonly destination: string;
  readonly prover: string;
}

export interface IntentWithdrawnPayload {
  readonly intentHash: string;
  readonly claimant: string;
}

export interface IntentRefundedPayload {
  readonly intentHash: string;
  readonly refundee: string;
}

export interface TokenRecoveredPayload {
  readonly intentHash: string;
  readonly refundee: string;
  readonly token: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const INTENT_EVENTS = {
  PUBLISHED: "intent.published",
  FUNDED: "intent.funded",
  PROVEN: "intent.proven",
  WITHDRAWN: "intent.withdrawn",
  REFUNDED: "intent.refunded",
  TOKEN_RECOVERED: "intent.token_recovered",
} as const;

export type IntentEventType = (typeof INTENT_EVENTS)[keyof typeof INTENT_EVENTS];

/**
 * Stream holding every event of one intent.
 */
export function intentStream(intentHash: Bytes32): string {
  return `intent:${intentHash}`;
}

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isDecimal(v: unknown): boolean {
  return typeof v === "string" && /^(0|[1-9]\d*)$/.test(v);
}

function isTokenAmountPayload(v: unknown): boolean {
  return isObject(v) && isAddress(v["token"]) && isDecimal(v["amount"]);
}

function hasIntentHash(p: Record<string, unknown>): boolean {
  return isBytes32(p["intentHash"]);
}

const SCHEMAS: readonly EventSchema[] = [
  {
    type: INTENT_EVENTS.PUBLISHED,
    description: "An intent was published and its vault address fixed",
    source: "funding",
    validate: (p) => {
      if (!isObject(p) || !hasIntentHash(p)) {
        return false;
      }
      const tokens = p["tokens"];
      return (
        isDecimal(p["destination"]) &&
        isAddress(p["creator"]) &&
        isAddress(p["prover"]) &&
        isDecimal(p["deadline"]) &&
        isDecimal(p["nativeAmount"]) &&
        Array.isArray(tokens) &&
        tokens.every(isTokenAmountPayload)
      );
    },
  },
  {
    type: INTENT_EVENTS.FUNDED,
    description: "Reward assets were moved into the intent vault",
    source: "funding",
    validate: (p) =>
      isObject(p) &&
      hasIntentHash(p) &&
      isAddress(p["funder"]) &&
      typeof p["complete"] === "boolean",
  },
  {
    type: INTENT_EVENTS.PROVEN,
    description: "A prover reported the intent fulfilled on its destination",
    source: "proof",
    validate: (p) =>
      isObject(p) &&
      hasIntentHash(p) &&
      isAddress(p["claimant"]) &&
      isDecimal(p["destination"]) &&
      isAddress(p["prover"]),
  },
  {
    type: INTENT_EVENTS.WITHDRAWN,
    description: "The reward was paid out to the proven claimant",
    source: "distribution",
    validate: (p) =>
      isObject(p) && hasIntentHash(p) && isAddress(p["claimant"]),
  },
  {
    type: INTENT_EVENTS.REFUNDED,
    description: "The reward was returned to the creator",
    source: "distribution",
    validate: (p) =>
      isObject(p) && hasIntentHash(p) && isAddress(p["refundee"]),
  },
  {
    type: INTENT_EVENTS.TOKEN_RECOVERED,
    description: "A token outside the reward was swept from the vault",
    source: "distribution",
    validate: (p) =>
      isObject(p) &&
      hasIntentHash(p) &&
      isAddress(p["refundee"]) &&
      isAddress(p["token"]),
  },
];

/**
 * A catalog with every settlement event registered.
 */
export function createIntentCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
