/**
 * Canonical serialization — deterministic CBOR encoding for content ids.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. bigint becomes its decimal string before encoding
 *   3. Same object → identical bytes, always
 */

import { Encoder } from "cbor-x";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Lower a value to plain JSON: bigint → decimal string, Map → object,
 * Set → array, undefined → null, keys sorted.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (value instanceof Set) return Array.from(value, toJsonValue);
  if (value instanceof Map) {
    return toJsonValue(Object.fromEntries(Array.from(value, ([k, v]) => [String(k), v])));
  }
  if (typeof value === "object") {
    const sorted: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = toJsonValue(entry);
    }
    return sorted;
  }
  return String(value);
}

/** Canonical encode: lower to JSON with sorted keys, then CBOR encode. */
export function canonicalEncode(value: unknown): Uint8Array {
  return encoder.encode(toJsonValue(value));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}

/** SHA256 of the canonical encoding, hex. */
export function contentId(value: unknown): string {
  return bytesToHex(sha256(canonicalEncode(value)));
}
