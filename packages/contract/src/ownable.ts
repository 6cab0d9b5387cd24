/**
 * Ownable capability — a single owner gates the admin surface.
 */

import { ZERO_ADDRESS, type Address } from "@setmint/ledger";
import { ensure } from "./errors.js";
import type { CollectionState } from "./state.js";

export function requireOwner(state: CollectionState, caller: Address): void {
  ensure(caller === state.owner && caller !== ZERO_ADDRESS, {
    code: "Unauthorized",
    caller,
  });
}

/** @returns the previous owner */
export function transferOwnership(state: CollectionState, newOwner: Address): Address {
  ensure(newOwner !== ZERO_ADDRESS, { code: "ZeroAddress", field: "newOwner" });
  const previous = state.owner;
  state.owner = newOwner;
  return previous;
}

/** Leave the collection without an owner. Every admin call fails afterwards. */
export function renounceOwnership(state: CollectionState): Address {
  const previous = state.owner;
  state.owner = ZERO_ADDRESS;
  return previous;
}
