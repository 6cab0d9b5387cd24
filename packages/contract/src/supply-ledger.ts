/**
 * Supply ledger — sets, counters, caps, pause gate, batch limit.
 *
 * Mint preconditions, checked in this order, first failure wins:
 *   1. not paused                      → ContractPaused
 *   2. quantity >= 1                   → InsufficientMintQuantity
 *   3. quantity <= batchLimit          → ExceedsBatchLimit
 *   4. counter + quantity <= maxSupply → ExceedsMaxSupply
 *
 * Only startSet() replaces the display pool. Configuring a set (even the
 * active one) leaves the pool alone, so the cap check also bounds quantity
 * by the pool's live size.
 */

import { FIRST_TOKEN_ID } from "./constants.js";
import { ensure } from "./errors.js";
import { createPool } from "./id-pool.js";
import {
  activeSet,
  checkCount,
  type CollectionState,
  type SetRecord,
} from "./state.js";

/** Units the active set can still issue. */
export function availableInSet(state: CollectionState): number {
  const set = activeSet(state);
  return Math.max(0, Math.min(set.maxSupply - set.counter, state.pool.size));
}

export function checkMint(state: CollectionState, quantity: number): void {
  checkCount("quantity", quantity);
  ensure(!state.paused, { code: "ContractPaused" });
  ensure(quantity >= 1, { code: "InsufficientMintQuantity", quantity });
  ensure(quantity <= state.batchLimit, {
    code: "ExceedsBatchLimit",
    quantity,
    batchLimit: state.batchLimit,
  });
  const available = availableInSet(state);
  ensure(quantity <= available, {
    code: "ExceedsMaxSupply",
    set: state.currentSet,
    requested: quantity,
    available,
  });
}

/** Count `quantity` units against the active set. Call after checkMint(). */
export function recordMint(state: CollectionState, quantity: number): void {
  activeSet(state).counter += quantity;
}

/**
 * Configure (or reconfigure) a set's cap, resume-from counter and base URI.
 * Does not touch the pool, so a future set can be staged while another is
 * active.
 */
export function configureSet(
  state: CollectionState,
  set: number,
  maxSupply: number,
  counter: number,
  baseURI: string,
): SetRecord {
  checkCount("set", set);
  checkCount("maxSupply", maxSupply);
  checkCount("counter", counter);
  ensure(counter <= maxSupply, { code: "InvalidSetConfig", set, maxSupply, counter });

  const record: SetRecord = { maxSupply, counter, baseURI };
  state.sets.set(set, record);
  return record;
}

export function isSetConfigured(record: SetRecord | undefined): record is SetRecord {
  return record !== undefined && record.baseURI.length > 0 && record.maxSupply > 0;
}

/**
 * Make `set` the active set and give it a fresh pool of its remaining
 * supply. Whatever was left in the previous pool is abandoned.
 * @returns the new pool size
 */
export function startSet(state: CollectionState, set: number): number {
  checkCount("set", set);
  ensure(set !== state.currentSet, { code: "SetAlreadyActive", set });
  const record = state.sets.get(set);
  ensure(isSetConfigured(record), { code: "SetNotConfigured", set });

  state.currentSet = set;
  state.pool = createPool(record.maxSupply - record.counter);
  return state.pool.size;
}

export function setPaused(state: CollectionState, paused: boolean): void {
  state.paused = paused;
}

/** Sum of caps over every configured set. */
export function totalMaxSupply(state: CollectionState): number {
  let total = 0;
  for (const record of state.sets.values()) total += record.maxSupply;
  return total;
}

export function totalMinted(state: CollectionState): number {
  return state.nextTokenId - FIRST_TOKEN_ID;
}
