/**
 * Host ledger interfaces — the boundary between a contract and the chain it runs on.
 *
 * Contracts never hold a reference to another contract's internals. They see
 * balances through these interfaces and mutate them only through calls that
 * report success or failure.
 */

/** 0x-prefixed, 20-byte hex account address (lowercase once normalized). */
export type Address = string;

/** Undo closure returned by a checkpoint. */
export type Restore = () => void;

/** Anything whose state must roll back with a failed transaction. */
export interface Journaled {
  checkpoint(): Restore;
}

export interface BlockContext {
  number: number;
  /** Block timestamp (ms since epoch). */
  timestamp: number;
  /** 32-byte hex beacon value, rotated every block. */
  prevrandao: string;
}

/**
 * Fungible token collaborator.
 *
 * Calls take the acting account explicitly (what the chain would call
 * msg.sender). Transfers return false instead of throwing, like older
 * ERC-20 tokens; callers must check the result.
 */
export interface PaymentToken {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
  totalSupply(): bigint;
  balanceOf(owner: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(owner: Address, spender: Address, amount: bigint): boolean;
  transfer(from: Address, to: Address, amount: bigint): boolean;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean;
}

/**
 * Runs when an account receives native value. Throwing rejects the
 * transfer and rolls back everything the hook did.
 */
export type ReceiveHook = (from: Address, amount: bigint) => void;

export type SendResult = { ok: true } | { ok: false; error: unknown };
