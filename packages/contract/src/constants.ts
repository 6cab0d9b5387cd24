/**
 * Collection constants.
 *
 * FIXED values are part of the contract's observable behavior.
 * DEFAULT values apply only when the deploy bundle leaves a field out.
 */

// ── Fixed ──────────────────────────────────────────────────────────
export const MAX_BATCH_LIMIT = 100;
export const ROYALTY_FEE_DENOMINATOR = 10_000;
export const FIRST_TOKEN_ID = 1;
export const INITIAL_SET_ID = 0;

/** Domain prefix for display-number draws. */
export const DRAW_PREFIX = "SETMINT_DRAW";

// ── Defaults ───────────────────────────────────────────────────────
export const DEFAULT_BATCH_LIMIT = 10;
