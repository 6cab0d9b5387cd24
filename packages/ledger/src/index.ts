/**
 * @setmint/ledger — in-process host ledger.
 *
 * Contracts import the interfaces; nodes and tests construct a Chain and
 * deploy InMemoryToken instances on it.
 */

export type {
  Address,
  BlockContext,
  Journaled,
  PaymentToken,
  ReceiveHook,
  Restore,
  SendResult,
} from "./types.js";

export {
  ZERO_ADDRESS,
  isAddress,
  isZeroAddress,
  normalizeAddress,
  addressFromLabel,
} from "./address.js";

export { Chain, LedgerError, type ChainOptions } from "./chain.js";
export { InMemoryToken, type FungibleTokenOptions } from "./fungible-token.js";
