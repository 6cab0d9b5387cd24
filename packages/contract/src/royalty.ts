/**
 * Royalty reporting — one collection-wide receiver and rate.
 *
 * royaltyAmount = salePrice × numerator / 10_000 (floored)
 *
 * Reporting only; nothing here collects or enforces payment.
 */

import type { Address } from "@setmint/ledger";
import { ROYALTY_FEE_DENOMINATOR } from "./constants.js";
import { checkAmount, checkRoyaltyNumerator, type CollectionState } from "./state.js";

export interface RoyaltyQuote {
  receiver: Address;
  royaltyAmount: bigint;
}

export function royaltyInfo(state: CollectionState, salePrice: bigint): RoyaltyQuote {
  checkAmount("salePrice", salePrice);
  const { receiver, numerator } = state.royalty;
  return {
    receiver,
    royaltyAmount: (salePrice * BigInt(numerator)) / BigInt(ROYALTY_FEE_DENOMINATOR),
  };
}

export function setRoyalty(
  state: CollectionState,
  receiver: Address,
  numerator: number,
): void {
  state.royalty = { receiver, numerator: checkRoyaltyNumerator(numerator) };
}
