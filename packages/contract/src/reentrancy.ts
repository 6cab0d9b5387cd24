/**
 * Single-entry guard held by mint and every owner entry point.
 *
 * The flag lives in the collection state so it rolls back with everything
 * else; a guarded call that re-enters any guarded entry point fails with
 * ReentrantCall.
 */

import { ensure } from "./errors.js";
import type { CollectionState } from "./state.js";

export function nonReentrant<T>(state: CollectionState, fn: () => T): T {
  ensure(!state.entered, { code: "ReentrantCall" });
  state.entered = true;
  try {
    return fn();
  } finally {
    state.entered = false;
  }
}
