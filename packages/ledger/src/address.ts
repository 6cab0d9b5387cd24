/**
 * Account address helpers.
 */

import type { Address } from "./types.js";

export const ZERO_ADDRESS: Address = "0x" + "0".repeat(40);

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: string): boolean {
  return ADDRESS_RE.test(value);
}

/** Lowercase a well-formed address. Throws on anything else. */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new Error(`Invalid address: ${value}`);
  }
  return value.toLowerCase();
}

export function isZeroAddress(value: Address): boolean {
  return normalizeAddress(value) === ZERO_ADDRESS;
}

/**
 * Deterministic address from a label, for fixtures and dev deployments.
 * "alice" → 0x616c696365000…000
 */
export function addressFromLabel(label: string): Address {
  const hex = Array.from(new TextEncoder().encode(label))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("")
    .slice(0, 40);
  return "0x" + hex.padEnd(40, "0");
}
