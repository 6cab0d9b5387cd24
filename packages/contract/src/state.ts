/**
 * Collection state — the one struct every operation reads and writes.
 *
 * Nothing lives in module scope. Operations take the state as their first
 * argument; the contract facade owns the instance and checkpoints it.
 */

import { ZERO_ADDRESS, isAddress, normalizeAddress, type Address } from "@setmint/ledger";
import {
  DEFAULT_BATCH_LIMIT,
  FIRST_TOKEN_ID,
  INITIAL_SET_ID,
  MAX_BATCH_LIMIT,
  ROYALTY_FEE_DENOMINATOR,
} from "./constants.js";
import { ContractError, ensure } from "./errors.js";
import { createPool, type DisplayPool } from "./id-pool.js";

export interface SetRecord {
  maxSupply: number;
  /** Units minted under this set; never exceeds maxSupply. */
  counter: number;
  baseURI: string;
}

export interface TokenRecord {
  owner: Address;
  set: number;
  displayNumber: number;
}

export interface RoyaltyConfig {
  receiver: Address;
  /** Over ROYALTY_FEE_DENOMINATOR. */
  numerator: number;
}

export interface CollectionState {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly paymentToken: Address;

  owner: Address;
  paused: boolean;
  batchLimit: number;
  ethFee: bigint;
  tokenFee: bigint;
  feeAddress: Address;
  royalty: RoyaltyConfig;
  contractURI: string;

  sets: Map<number, SetRecord>;
  currentSet: number;
  pool: DisplayPool;
  drawNonce: number;

  nextTokenId: number;
  tokens: Map<number, TokenRecord>;
  balances: Map<Address, number>;
  tokenApprovals: Map<number, Address>;
  operatorApprovals: Map<Address, Set<Address>>;

  /** Reentrancy flag: set while a guarded call runs. */
  entered: boolean;
}

/** Constructor parameters, decoded (amounts as bigint). */
export interface CollectionParams {
  name: string;
  symbol: string;
  owner: Address;
  tokenFee: bigint;
  ethFee: bigint;
  feeAddress: Address;
  paymentToken: Address;
  baseURI: string;
  contractURI: string;
  maxSupply: number;
  royaltyNumerator: number;
  batchLimit?: number;
}

// ── Input checks shared by constructor and setters ────────────────

export function toAddress(field: string, value: string): Address {
  ensure(isAddress(value), { code: "InvalidAddress", field, value });
  return normalizeAddress(value);
}

export function toNonZeroAddress(field: string, value: string): Address {
  const address = toAddress(field, value);
  ensure(address !== ZERO_ADDRESS, { code: "ZeroAddress", field });
  return address;
}

export function checkCount(field: string, value: number): number {
  ensure(Number.isSafeInteger(value) && value >= 0, {
    code: "InvalidAmount",
    field,
    value: String(value),
  });
  return value;
}

export function checkAmount(field: string, value: bigint): bigint {
  ensure(value >= 0n, { code: "InvalidAmount", field, value: value.toString() });
  return value;
}

export function checkBatchLimit(batchLimit: number): number {
  checkCount("batchLimit", batchLimit);
  ensure(batchLimit <= MAX_BATCH_LIMIT, {
    code: "BatchLimitTooHigh",
    batchLimit,
    max: MAX_BATCH_LIMIT,
  });
  return batchLimit;
}

export function checkRoyaltyNumerator(numerator: number): number {
  checkCount("royaltyNumerator", numerator);
  ensure(numerator <= ROYALTY_FEE_DENOMINATOR, {
    code: "RoyaltyTooHigh",
    numerator,
    denominator: ROYALTY_FEE_DENOMINATOR,
  });
  return numerator;
}

// ── Construction ──────────────────────────────────────────────────

/**
 * Build the initial state: set 0 configured from the bundle and active,
 * minting paused.
 */
export function createCollectionState(
  address: Address,
  params: CollectionParams,
): CollectionState {
  const owner = toNonZeroAddress("owner", params.owner);
  const maxSupply = checkCount("maxSupply", params.maxSupply);

  return {
    address: toNonZeroAddress("address", address),
    name: params.name,
    symbol: params.symbol,
    paymentToken: toAddress("paymentToken", params.paymentToken),
    owner,
    paused: true,
    batchLimit: checkBatchLimit(params.batchLimit ?? DEFAULT_BATCH_LIMIT),
    ethFee: checkAmount("ethFee", params.ethFee),
    tokenFee: checkAmount("tokenFee", params.tokenFee),
    feeAddress: toNonZeroAddress("feeAddress", params.feeAddress),
    royalty: {
      receiver: owner,
      numerator: checkRoyaltyNumerator(params.royaltyNumerator),
    },
    contractURI: params.contractURI,
    sets: new Map([[INITIAL_SET_ID, { maxSupply, counter: 0, baseURI: params.baseURI }]]),
    currentSet: INITIAL_SET_ID,
    pool: createPool(maxSupply),
    drawNonce: 0,
    nextTokenId: FIRST_TOKEN_ID,
    tokens: new Map(),
    balances: new Map(),
    tokenApprovals: new Map(),
    operatorApprovals: new Map(),
    entered: false,
  };
}

/** The active set's record. Always present: set 0 exists from construction. */
export function activeSet(state: CollectionState): SetRecord {
  const record = state.sets.get(state.currentSet);
  if (!record) {
    throw new ContractError({ code: "SetNotConfigured", set: state.currentSet });
  }
  return record;
}
