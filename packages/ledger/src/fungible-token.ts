/**
 * In-memory fungible token with a fixed supply minted once at creation.
 *
 * Used as the payment-token collaborator in dev nodes and tests. Follows the
 * boolean-returning ERC-20 convention: a transfer the token cannot make
 * returns false and changes nothing.
 */

import { ZERO_ADDRESS, normalizeAddress } from "./address.js";
import type { Address, Journaled, PaymentToken, Restore } from "./types.js";

export interface FungibleTokenOptions {
  address: Address;
  name: string;
  symbol: string;
  decimals?: number;
  /** Receives the entire supply. */
  holder: Address;
  supply: bigint;
}

export class InMemoryToken implements PaymentToken, Journaled {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  private readonly supply: bigint;
  private balances = new Map<Address, bigint>();
  private allowances = new Map<string, bigint>();
  private halted = false;

  constructor(options: FungibleTokenOptions) {
    if (options.supply < 0n) {
      throw new Error(`InMemoryToken: negative supply ${options.supply}`);
    }
    this.address = normalizeAddress(options.address);
    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = options.decimals ?? 18;
    this.supply = options.supply;
    this.balances.set(normalizeAddress(options.holder), options.supply);
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(owner: Address): bigint {
    return this.balances.get(normalizeAddress(owner)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): boolean {
    if (amount < 0n || normalizeAddress(spender) === ZERO_ADDRESS) return false;
    this.allowances.set(allowanceKey(owner, spender), amount);
    return true;
  }

  transfer(from: Address, to: Address, amount: bigint): boolean {
    return this.move(from, to, amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean {
    const key = allowanceKey(from, spender);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) return false;
    if (!this.move(from, to, amount)) return false;
    this.allowances.set(key, allowed - amount);
    return true;
  }

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    return () => {
      this.balances = balances;
      this.allowances = allowances;
    };
  }

  /** Test helper: make every transfer report failure. */
  halt(halted: boolean): void {
    this.halted = halted;
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    if (this.halted || amount < 0n) return false;
    const src = normalizeAddress(from);
    const dst = normalizeAddress(to);
    if (dst === ZERO_ADDRESS) return false;
    const balance = this.balances.get(src) ?? 0n;
    if (balance < amount) return false;
    this.balances.set(src, balance - amount);
    this.balances.set(dst, (this.balances.get(dst) ?? 0n) + amount);
    return true;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${normalizeAddress(owner)}:${normalizeAddress(spender)}`;
}
