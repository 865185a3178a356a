/**
 * JSON rendering of domain values.
 *
 * Domain objects carry bigint quantities, which JSON cannot hold; they
 * are rendered as decimal strings, the same form requests use.
 */

export type Json =
  | string
  | number
  | boolean
  | null
  | Json[]
  | { [key: string]: Json };

export function toJson(value: unknown): Json {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJson);
  }
  if (typeof value === "object") {
    const out: { [key: string]: Json } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) {
        out[key] = toJson(field);
      }
    }
    return out;
  }
  return null;
}
