/**
 * @setmint/contract — the set-based mint contract.
 *
 * Pure logic over an in-process ledger. No I/O, no clocks: the chain
 * supplies block context and the random source supplies draw words.
 */

// Constants
export {
  MAX_BATCH_LIMIT,
  ROYALTY_FEE_DENOMINATOR,
  FIRST_TOKEN_ID,
  INITIAL_SET_ID,
  DRAW_PREFIX,
  DEFAULT_BATCH_LIMIT,
} from "./constants.js";

// Errors
export {
  ContractError,
  isContractError,
  ensure,
  type ContractFailure,
  type ErrorCode,
  type ErrorKind,
} from "./errors.js";

// Events
export {
  EventLog,
  isEventOfType,
  type ContractEvent,
  type ContractEventType,
  type LogEntry,
} from "./events.js";

// Display-number pool + randomness
export {
  createPool,
  drawDisplayNumber,
  remainingValues,
  slotValue,
  type DisplayPool,
} from "./id-pool.js";
export {
  blockEntropySource,
  drawHash,
  sequenceSource,
  type EntropyContext,
  type RandomSource,
} from "./randomness.js";

// State + operations
export {
  createCollectionState,
  type CollectionParams,
  type CollectionState,
  type RoyaltyConfig,
  type SetRecord,
  type TokenRecord,
} from "./state.js";
export { availableInSet, totalMaxSupply, totalMinted } from "./supply-ledger.js";
export { quoteFees, type FeeQuote } from "./fee-engine.js";
export type { RoyaltyQuote } from "./royalty.js";

// Facade
export {
  SetMintContract,
  type CallMsg,
  type ContractDeps,
  type MintReceipt,
} from "./contract.js";

// Canonical encoding
export {
  canonicalEncode,
  canonicalDecode,
  contentId,
  toJsonValue,
  type JsonValue,
} from "./canonical.js";

// Schemas
export * from "./schemas/index.js";
