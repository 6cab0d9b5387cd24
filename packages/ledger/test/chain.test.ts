/**
 * Chain tests — value moves, transaction rollback, low-level sends.
 */

import { describe, it, expect } from "vitest";
import {
  Chain,
  InMemoryToken,
  LedgerError,
  addressFromLabel,
} from "../src/index.js";

const ALICE = addressFromLabel("alice");
const BOB = addressFromLabel("bob");
const TOKEN = addressFromLabel("token");

describe("Chain value transfers", () => {
  it("credits and moves native value", () => {
    const chain = new Chain();
    chain.credit(ALICE, 100n);
    chain.transferValue(ALICE, BOB, 40n);
    expect(chain.balanceOf(ALICE)).toBe(60n);
    expect(chain.balanceOf(BOB)).toBe(40n);
  });

  it("normalizes address case", () => {
    const chain = new Chain();
    chain.credit(ALICE.toUpperCase().replace("0X", "0x"), 5n);
    expect(chain.balanceOf(ALICE)).toBe(5n);
  });

  it("rejects overdrafts with insufficient_funds", () => {
    const chain = new Chain();
    chain.credit(ALICE, 10n);
    try {
      chain.transferValue(ALICE, BOB, 11n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect(err).toMatchObject({ code: "insufficient_funds" });
    }
    expect(chain.balanceOf(ALICE)).toBe(10n);
  });

  it("zero-value transfer is a no-op even from an empty account", () => {
    const chain = new Chain();
    chain.transferValue(ALICE, BOB, 0n);
    expect(chain.balanceOf(BOB)).toBe(0n);
  });
});

describe("Chain.transact", () => {
  it("restores balances and registered participants when the call throws", () => {
    const chain = new Chain();
    const token = new InMemoryToken({
      address: TOKEN,
      name: "Test",
      symbol: "TST",
      holder: ALICE,
      supply: 1_000n,
    });
    chain.deployToken(token);
    chain.credit(ALICE, 100n);

    expect(() =>
      chain.transact(() => {
        chain.transferValue(ALICE, BOB, 50n);
        token.transfer(ALICE, BOB, 300n);
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(chain.balanceOf(ALICE)).toBe(100n);
    expect(chain.balanceOf(BOB)).toBe(0n);
    expect(token.balanceOf(ALICE)).toBe(1_000n);
    expect(token.balanceOf(BOB)).toBe(0n);
  });

  it("keeps changes from a successful call", () => {
    const chain = new Chain();
    chain.credit(ALICE, 100n);
    const result = chain.transact(() => {
      chain.transferValue(ALICE, BOB, 30n);
      return "done";
    });
    expect(result).toBe("done");
    expect(chain.balanceOf(BOB)).toBe(30n);
  });

  it("tracks nesting depth", () => {
    const chain = new Chain();
    expect(chain.inTransaction).toBe(false);
    chain.transact(() => {
      expect(chain.inTransaction).toBe(true);
    });
    expect(chain.inTransaction).toBe(false);
  });
});

describe("Chain.sendValue", () => {
  it("reports ok and moves value when the receiver accepts", () => {
    const chain = new Chain();
    chain.credit(ALICE, 10n);
    const seen: bigint[] = [];
    chain.onReceive(BOB, (_from, amount) => {
      seen.push(amount);
    });
    expect(chain.sendValue(ALICE, BOB, 7n)).toEqual({ ok: true });
    expect(chain.balanceOf(BOB)).toBe(7n);
    expect(seen).toEqual([7n]);
  });

  it("rolls back and reports the cause when the receiver rejects", () => {
    const chain = new Chain();
    chain.credit(ALICE, 10n);
    const rejection = new Error("no thanks");
    chain.onReceive(BOB, () => {
      throw rejection;
    });
    const result = chain.sendValue(ALICE, BOB, 7n);
    expect(result).toEqual({ ok: false, error: rejection });
    expect(chain.balanceOf(ALICE)).toBe(10n);
    expect(chain.balanceOf(BOB)).toBe(0n);
  });

  it("reports failure when the sender is short", () => {
    const chain = new Chain();
    const result = chain.sendValue(ALICE, BOB, 1n);
    expect(result.ok).toBe(false);
  });

  it("clearing a hook restores plain transfers", () => {
    const chain = new Chain();
    chain.credit(ALICE, 10n);
    chain.onReceive(BOB, () => {
      throw new Error("closed");
    });
    chain.onReceive(BOB, undefined);
    expect(chain.sendValue(ALICE, BOB, 10n).ok).toBe(true);
  });
});

describe("Chain blocks", () => {
  it("advances number, keeps timestamps monotonic, rotates the beacon", () => {
    const chain = new Chain({ timestamp: 1_000 });
    const genesis = chain.blockContext;
    const next = chain.advanceBlock(500);
    expect(next.number).toBe(1);
    expect(next.timestamp).toBe(1_000);
    expect(next.prevrandao).toMatch(/^[0-9a-f]{64}$/);
    expect(next.prevrandao).not.toBe(genesis.prevrandao);
  });

  it("beacon rotation is deterministic for the same genesis", () => {
    const a = new Chain({ timestamp: 0 });
    const b = new Chain({ timestamp: 0 });
    expect(a.advanceBlock(1).prevrandao).toBe(b.advanceBlock(1).prevrandao);
  });
});

describe("Chain tokens", () => {
  it("finds deployed tokens by address and refuses duplicates", () => {
    const chain = new Chain();
    const token = new InMemoryToken({
      address: TOKEN,
      name: "Test",
      symbol: "TST",
      holder: ALICE,
      supply: 1n,
    });
    chain.deployToken(token);
    expect(chain.tokenAt(TOKEN)).toBe(token);
    expect(chain.tokenAt(BOB)).toBeUndefined();
    expect(() => chain.deployToken(token)).toThrow(LedgerError);
  });
});
