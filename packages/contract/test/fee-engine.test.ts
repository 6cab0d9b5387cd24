/**
 * Fee collection tests — native value, payment token, rollback, reentrancy.
 */

import { describe, it, expect, vi } from "vitest";
import { LedgerError } from "@setmint/ledger";
import { isContractError } from "../src/index.js";
import {
  ALICE,
  BOB,
  COLLECTION,
  FEE,
  OWNER,
  TOKEN,
  deployOpen,
  expectFailure,
} from "./fixtures.js";

describe("quoteFees", () => {
  it("multiplies per-unit fees by quantity", () => {
    const { contract } = deployOpen({ ethFee: 10n, tokenFee: 5n });
    expect(contract.quoteFees(3)).toEqual({ ethFee: 30n, tokenFee: 15n });
  });
});

describe("mint with fees", () => {
  it("pulls the token fee and forwards exactly the native fee", () => {
    const { chain, token, contract } = deployOpen({ ethFee: 10n, tokenFee: 5n });
    token.approve(ALICE, COLLECTION, 100n);

    const receipt = contract.mint({ caller: ALICE, value: 25n }, 2);

    expect(receipt.fees).toEqual({ ethFee: 20n, tokenFee: 10n });
    expect(chain.balanceOf(ALICE)).toBe(975n);
    expect(chain.balanceOf(FEE)).toBe(20n);
    // surplus stays with the collection
    expect(chain.balanceOf(COLLECTION)).toBe(5n);
    expect(token.balanceOf(FEE)).toBe(10n);
    expect(token.balanceOf(ALICE)).toBe(999_990n);
    expect(token.allowance(ALICE, COLLECTION)).toBe(90n);
  });

  it("zero fees need neither value nor allowance", () => {
    const { chain, token, contract } = deployOpen();
    contract.mint({ caller: BOB }, 1);
    expect(chain.balanceOf(BOB)).toBe(1_000n);
    expect(token.balanceOf(FEE)).toBe(0n);
  });

  it("a zero token fee never calls the payment token", () => {
    const { chain, token, contract } = deployOpen({ ethFee: 10n });
    token.halt(true);
    const transferFrom = vi.spyOn(token, "transferFrom");

    expect(contract.mint({ caller: ALICE, value: 10n }, 1).tokenIds).toEqual([1]);
    expect(transferFrom).not.toHaveBeenCalled();
    expect(chain.balanceOf(FEE)).toBe(10n);
  });

  it("a zero native fee never calls the fee address", () => {
    const { chain, token, contract } = deployOpen({ tokenFee: 5n });
    token.approve(ALICE, COLLECTION, 100n);
    chain.onReceive(FEE, () => {
      throw new Error("not accepting");
    });

    expect(contract.mint({ caller: ALICE }, 1).fees).toEqual({ ethFee: 0n, tokenFee: 5n });
    expect(chain.balanceOf(FEE)).toBe(0n);
    expect(token.balanceOf(FEE)).toBe(5n);
  });

  it("a quantity over the batch limit moves no funds", () => {
    const { chain, token, contract } = deployOpen({ ethFee: 10n, tokenFee: 5n, maxSupply: 50 });
    token.approve(ALICE, COLLECTION, 100n);

    expectFailure(() => contract.mint({ caller: ALICE, value: 110n }, 11), {
      code: "ExceedsBatchLimit",
      quantity: 11,
      batchLimit: 10,
    });
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
    expect(chain.balanceOf(FEE)).toBe(0n);
    expect(chain.balanceOf(COLLECTION)).toBe(0n);
    expect(token.balanceOf(ALICE)).toBe(1_000_000n);
    expect(token.balanceOf(FEE)).toBe(0n);
    expect(token.allowance(ALICE, COLLECTION)).toBe(100n);
  });

  it("rejects too little attached value and keeps the caller's funds", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n });
    expectFailure(() => contract.mint({ caller: ALICE, value: 19n }, 2), {
      code: "InsufficientEthFee",
      provided: 19n,
      required: 20n,
    });
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
    expect(chain.balanceOf(COLLECTION)).toBe(0n);
  });

  it("checks the token balance before the attached value", () => {
    const { contract } = deployOpen({ ethFee: 10n, tokenFee: 5n });
    expectFailure(() => contract.mint({ caller: BOB }, 1), {
      code: "InsufficientTokenBalance",
      balance: 0n,
      required: 5n,
    });
  });

  it("a refused token pull rolls back the attached value", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n, tokenFee: 5n });
    const err = expectFailure(() => contract.mint({ caller: ALICE, value: 10n }, 1), {
      code: "TokenTransferFailed",
      token: TOKEN,
    });
    expect(err.kind).toBe("transport");
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
    expect(chain.balanceOf(FEE)).toBe(0n);
    expect(contract.totalMinted()).toBe(0);
  });

  it("a halted token fails the mint", () => {
    const { token, contract } = deployOpen({ tokenFee: 5n });
    token.approve(ALICE, COLLECTION, 100n);
    token.halt(true);
    expectFailure(() => contract.mint({ caller: ALICE }, 1), {
      code: "TokenTransferFailed",
      token: TOKEN,
    });
    expect(token.allowance(ALICE, COLLECTION)).toBe(100n);
  });

  it("a fee receiver that rejects value fails the mint and undoes the token pull", () => {
    const { chain, token, contract } = deployOpen({ ethFee: 10n, tokenFee: 5n });
    token.approve(ALICE, COLLECTION, 100n);
    chain.onReceive(FEE, () => {
      throw new Error("not accepting");
    });

    expectFailure(() => contract.mint({ caller: ALICE, value: 10n }, 1), {
      code: "EthTransferFailed",
      receiver: FEE,
      amount: 10n,
    });
    expect(token.balanceOf(FEE)).toBe(0n);
    expect(token.allowance(ALICE, COLLECTION)).toBe(100n);
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
  });

  it("a caller without enough native value fails at the ledger", () => {
    const { contract } = deployOpen({ ethFee: 10n });
    expect(() => contract.mint({ caller: ALICE, value: 5_000n }, 1)).toThrow(LedgerError);
  });
});

describe("reentrancy", () => {
  it("a fee receiver re-entering mint is refused and the whole call rolls back", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n });
    chain.credit(FEE, 100n);
    chain.onReceive(FEE, () => {
      contract.mint({ caller: FEE, value: 10n }, 1);
    });
    const logLength = contract.log.length;

    const err = expectFailure(() => contract.mint({ caller: ALICE, value: 10n }, 1), {
      code: "EthTransferFailed",
      receiver: FEE,
      amount: 10n,
    });
    expect(isContractError(err.cause)).toBe(true);
    expect(err.cause).toMatchObject({ failure: { code: "ReentrantCall" } });

    expect(contract.totalMinted()).toBe(0);
    expect(contract.log.length).toBe(logLength);
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
    expect(chain.balanceOf(FEE)).toBe(100n);

    // guard is released afterwards
    chain.onReceive(FEE, undefined);
    expect(contract.mint({ caller: ALICE, value: 10n }, 1).tokenIds).toEqual([1]);
  });

  it("a fee receiver cannot shrink the active set mid-mint", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n });
    chain.onReceive(FEE, () => {
      contract.setBaseURI(OWNER, 0, 1, 0, "a/");
    });

    const err = expectFailure(() => contract.mint({ caller: ALICE, value: 30n }, 3), {
      code: "EthTransferFailed",
      receiver: FEE,
      amount: 30n,
    });
    expect(err.cause).toMatchObject({ failure: { code: "ReentrantCall" } });
    expect(contract.maxSupply(0)).toBe(10);
    expect(contract.counter(0)).toBe(0);
    expect(contract.totalMinted()).toBe(0);
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
  });

  it("a fee receiver cannot switch sets mid-mint", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n });
    contract.setBaseURI(OWNER, 1, 2, 0, "b/");
    chain.onReceive(FEE, () => {
      contract.startSet(OWNER, 1);
    });

    const err = expectFailure(() => contract.mint({ caller: ALICE, value: 30n }, 3), {
      code: "EthTransferFailed",
      receiver: FEE,
      amount: 30n,
    });
    expect(err.cause).toMatchObject({ failure: { code: "ReentrantCall" } });
    expect(contract.currentSet()).toBe(0);
    expect(contract.remainingInSet()).toBe(10);
    expect(contract.counter(1)).toBe(0);
  });

  it("a withdrawal receiver cannot re-enter withdrawETH", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n });
    contract.mint({ caller: ALICE, value: 15n }, 1);
    chain.onReceive(OWNER, () => {
      contract.withdrawETH(OWNER, OWNER);
    });
    expectFailure(() => contract.withdrawETH(OWNER, OWNER), {
      code: "EthTransferFailed",
      receiver: OWNER,
      amount: 5n,
    });
    expect(chain.balanceOf(COLLECTION)).toBe(5n);
  });
});

describe("withdrawals", () => {
  it("withdrawETH sweeps the surplus to the receiver", () => {
    const { chain, contract } = deployOpen({ ethFee: 10n });
    contract.mint({ caller: ALICE, value: 15n }, 1);
    expect(contract.withdrawETH(OWNER, BOB)).toBe(5n);
    expect(chain.balanceOf(BOB)).toBe(1_005n);
    expect(chain.balanceOf(COLLECTION)).toBe(0n);
    expect(contract.log.ofType("Withdrawn")).toEqual([
      { type: "Withdrawn", actor: OWNER, asset: "native", receiver: BOB, amount: 5n },
    ]);
  });

  it("withdrawTokens sweeps tokens sent straight to the collection", () => {
    const { token, contract } = deployOpen();
    token.transfer(ALICE, COLLECTION, 42n);
    expect(contract.withdrawTokens(OWNER, TOKEN, OWNER)).toBe(42n);
    expect(token.balanceOf(OWNER)).toBe(42n);
    expect(token.balanceOf(COLLECTION)).toBe(0n);
  });

  it("withdrawing from an unknown token contract fails", () => {
    const { contract } = deployOpen();
    const unknown = "0x" + "ab".repeat(20);
    expectFailure(() => contract.withdrawTokens(OWNER, unknown, OWNER), {
      code: "TokenTransferFailed",
      token: unknown,
    });
  });

  it("only the owner withdraws", () => {
    const { contract } = deployOpen();
    expectFailure(() => contract.withdrawETH(ALICE, ALICE), {
      code: "Unauthorized",
      caller: ALICE,
    });
  });
});
