/**
 * Display-number pool — swap-and-pop over a sparse slot table.
 *
 * The pool models an array of `size` slots where slot i holds the display
 * number parked there. A slot with no entry holds i itself, so a fresh pool
 * of any size costs nothing to create.
 *
 * draw(word):
 *   idx   = word mod size
 *   out   = slots[idx] ?? idx
 *   slots[idx] = slots[last] ?? last   (unless idx is last)
 *   drop slot `last`, size -= 1
 *
 * After k draws from a pool of N: size = N - k, and the values drawn plus
 * the effective values of the remaining slots are exactly 0..N-1, each once.
 */

export interface DisplayPool {
  size: number;
  /** slot → parked display number; absent means slot holds its own index. */
  slots: Map<number, number>;
}

export function createPool(size: number): DisplayPool {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new RangeError(`createPool: invalid size ${size}`);
  }
  return { size, slots: new Map() };
}

/** Effective value of a slot (sentinel rule applied). */
export function slotValue(pool: DisplayPool, slot: number): number {
  return pool.slots.get(slot) ?? slot;
}

/**
 * Draw one display number. The caller guarantees size > 0; the supply
 * ledger's cap check makes that hold for every mint.
 */
export function drawDisplayNumber(pool: DisplayPool, word: bigint): number {
  if (pool.size <= 0) {
    throw new RangeError("drawDisplayNumber: pool exhausted");
  }
  if (word < 0n) {
    throw new RangeError(`drawDisplayNumber: negative random word ${word}`);
  }

  const idx = Number(word % BigInt(pool.size));
  const last = pool.size - 1;
  const drawn = slotValue(pool, idx);

  if (idx !== last) {
    pool.slots.set(idx, slotValue(pool, last));
  }
  pool.slots.delete(last);
  pool.size = last;

  return drawn;
}

/** Effective values of every remaining slot, in slot order. */
export function remainingValues(pool: DisplayPool): number[] {
  return Array.from({ length: pool.size }, (_, slot) => slotValue(pool, slot));
}
