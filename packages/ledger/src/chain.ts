/**
 * In-process chain — native balances, block context, atomic transactions.
 *
 * Every state-changing call runs inside transact(): all registered
 * participants are checkpointed first and restored if the call throws, so a
 * failed call leaves no trace (fee transfers included). Calls nest; an inner
 * failure rolls back only the inner call unless it propagates.
 *
 * sendValue() is the low-level value call: the receiver's hook runs in a
 * nested transaction and a failure comes back as { ok: false } instead of
 * propagating.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { normalizeAddress } from "./address.js";
import type {
  Address,
  BlockContext,
  Journaled,
  PaymentToken,
  ReceiveHook,
  Restore,
  SendResult,
} from "./types.js";

export class LedgerError extends Error {
  constructor(
    readonly code: "insufficient_funds" | "invalid_amount" | "duplicate_token",
    message: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

export interface ChainOptions {
  /** Genesis block timestamp (ms). Default: Date.now(). */
  timestamp?: number;
  /** Genesis beacon (32-byte hex). Default: all zeros. */
  prevrandao?: string;
}

export class Chain implements Journaled {
  private balances = new Map<Address, bigint>();
  private readonly hooks = new Map<Address, ReceiveHook>();
  private readonly tokens = new Map<Address, PaymentToken>();
  private readonly participants: Journaled[] = [];
  private block: BlockContext;
  private depth = 0;

  constructor(options: ChainOptions = {}) {
    this.block = {
      number: 0,
      timestamp: options.timestamp ?? Date.now(),
      prevrandao: options.prevrandao ?? "00".repeat(32),
    };
  }

  // ── Blocks ───────────────────────────────────────────────────────

  get blockContext(): BlockContext {
    return { ...this.block };
  }

  /** Seal the current block and open the next one. */
  advanceBlock(timestamp: number = Date.now()): BlockContext {
    const seed = new Uint8Array(36);
    seed.set(hexToBytes(this.block.prevrandao), 0);
    new DataView(seed.buffer).setUint32(32, this.block.number + 1, false);
    this.block = {
      number: this.block.number + 1,
      timestamp: Math.max(timestamp, this.block.timestamp),
      prevrandao: bytesToHex(sha256(seed)),
    };
    return this.blockContext;
  }

  // ── Participants ─────────────────────────────────────────────────

  register(participant: Journaled): void {
    this.participants.push(participant);
  }

  /** Register a token contract; it becomes reachable via tokenAt(). */
  deployToken(token: PaymentToken & Journaled): void {
    const address = normalizeAddress(token.address);
    if (this.tokens.has(address)) {
      throw new LedgerError("duplicate_token", `Token already deployed at ${address}`);
    }
    this.tokens.set(address, token);
    this.register(token);
  }

  tokenAt(address: Address): PaymentToken | undefined {
    return this.tokens.get(normalizeAddress(address));
  }

  /** Install (or clear, with undefined) the receive hook for an account. */
  onReceive(address: Address, hook: ReceiveHook | undefined): void {
    const key = normalizeAddress(address);
    if (hook) this.hooks.set(key, hook);
    else this.hooks.delete(key);
  }

  // ── Transactions ─────────────────────────────────────────────────

  /** True while a transaction is executing. */
  get inTransaction(): boolean {
    return this.depth > 0;
  }

  transact<T>(fn: () => T): T {
    const restores = [this.checkpoint(), ...this.participants.map((p) => p.checkpoint())];
    this.depth++;
    try {
      return fn();
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      throw err;
    } finally {
      this.depth--;
    }
  }

  checkpoint(): Restore {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }

  // ── Native value ─────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this.balances.get(normalizeAddress(address)) ?? 0n;
  }

  /** Genesis allocation / faucet. */
  credit(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("invalid_amount", `Negative credit: ${amount}`);
    }
    const key = normalizeAddress(address);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  /**
   * Move value as part of the calling transaction (the value a caller
   * attaches to a call). Throws when the sender cannot cover it.
   */
  transferValue(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("invalid_amount", `Negative transfer: ${amount}`);
    }
    if (amount === 0n) return;
    const src = normalizeAddress(from);
    const dst = normalizeAddress(to);
    const balance = this.balances.get(src) ?? 0n;
    if (balance < amount) {
      throw new LedgerError(
        "insufficient_funds",
        `${src} holds ${balance}, needs ${amount}`,
      );
    }
    this.balances.set(src, balance - amount);
    this.balances.set(dst, (this.balances.get(dst) ?? 0n) + amount);
  }

  /**
   * Low-level value call: move value, then run the receiver's hook.
   * Never throws; a failed send rolls back and reports the cause.
   */
  sendValue(from: Address, to: Address, amount: bigint): SendResult {
    try {
      this.transact(() => {
        this.transferValue(from, to, amount);
        const hook = this.hooks.get(normalizeAddress(to));
        if (hook) hook(normalizeAddress(from), amount);
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, error };
    }
  }
}
