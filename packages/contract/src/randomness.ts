/**
 * Randomness sources for display-number draws.
 *
 * blockEntropySource: word = SHA256(DRAW_PREFIX || prevrandao || timestamp_u64be
 *                                   || block_u64be || caller || nonce_u32be)
 *
 * The block beacon is unknown to a caller before the block is produced, which
 * is enough for low-value drops. It is NOT secure against whoever produces
 * blocks; do not use it where a draw carries real value.
 *
 * sequenceSource replays fixed words and exists for tests.
 */

import { sha256 } from "@noble/hashes/sha256";
import { hexToBytes } from "@noble/hashes/utils";
import type { Address, BlockContext } from "@setmint/ledger";
import { DRAW_PREFIX } from "./constants.js";

export interface EntropyContext {
  block: BlockContext;
  caller: Address;
  /** Increments on every draw over the contract's lifetime. */
  nonce: number;
}

export interface RandomSource {
  /** A non-negative random word. */
  next(ctx: EntropyContext): bigint;
}

function uint64BE(n: number): Uint8Array {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, BigInt(n), false);
  return buf;
}

function uint32BE(n: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, n >>> 0, false);
  return buf;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const totalLen = parts.reduce((sum, p) => sum + p.length, 0);
  const combined = new Uint8Array(totalLen);
  let offset = 0;
  for (const part of parts) {
    combined.set(part, offset);
    offset += part.length;
  }
  return combined;
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  let out = 0n;
  for (const b of bytes) out = (out << 8n) | BigInt(b);
  return out;
}

/** Raw draw hash for a context. Exposed for debugging and test vectors. */
export function drawHash(ctx: EntropyContext): Uint8Array {
  return sha256(
    concat([
      new TextEncoder().encode(DRAW_PREFIX),
      hexToBytes(ctx.block.prevrandao),
      uint64BE(ctx.block.timestamp),
      uint64BE(ctx.block.number),
      hexToBytes(ctx.caller.slice(2).toLowerCase()),
      uint32BE(ctx.nonce),
    ]),
  );
}

export function blockEntropySource(): RandomSource {
  return {
    next: (ctx) => bytesToBigInt(drawHash(ctx)),
  };
}

/** Replays `words` in order, wrapping around. */
export function sequenceSource(words: ReadonlyArray<bigint | number>): RandomSource {
  if (words.length === 0) {
    throw new RangeError("sequenceSource: needs at least one word");
  }
  let cursor = 0;
  return {
    next: () => {
      const word = BigInt(words[cursor % words.length] ?? 0);
      cursor++;
      if (word < 0n) throw new RangeError(`sequenceSource: negative word ${word}`);
      return word;
    },
  };
}
