/**
 * Display-number assignment for newly minted units of the active set.
 *
 * Each unit takes one word from the random source (fresh nonce per draw)
 * and one swap-and-pop draw from the pool. Numbers are unique within a set
 * and, over a full sellout, cover 0..maxSupply-1.
 */

import type { Address, BlockContext } from "@setmint/ledger";
import { drawDisplayNumber } from "./id-pool.js";
import type { RandomSource } from "./randomness.js";
import type { CollectionState } from "./state.js";

export function assignDisplayNumbers(
  state: CollectionState,
  random: RandomSource,
  block: BlockContext,
  caller: Address,
  quantity: number,
): number[] {
  const numbers: number[] = [];
  for (let i = 0; i < quantity; i++) {
    const word = random.next({ block, caller, nonce: state.drawNonce });
    state.drawNonce++;
    numbers.push(drawDisplayNumber(state.pool, word));
  }
  return numbers;
}
