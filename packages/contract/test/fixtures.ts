/**
 * Shared test deployment: one chain, one payment token, one collection.
 */

import { expect } from "vitest";
import { Chain, InMemoryToken, addressFromLabel } from "@setmint/ledger";
import {
  ContractError,
  SetMintContract,
  isContractError,
  type CollectionParams,
  type ContractFailure,
} from "../src/index.js";
import { sequenceSource, type RandomSource } from "../src/randomness.js";

export const OWNER = addressFromLabel("owner");
export const FEE = addressFromLabel("fee");
export const ALICE = addressFromLabel("alice");
export const BOB = addressFromLabel("bob");
export const TOKEN = addressFromLabel("token");
export const COLLECTION = addressFromLabel("collection");

export interface Deployment {
  chain: Chain;
  token: InMemoryToken;
  contract: SetMintContract;
}

export function deploy(
  overrides: Partial<CollectionParams> = {},
  random: RandomSource = sequenceSource([0n]),
): Deployment {
  const chain = new Chain({ timestamp: 1_700_000_000_000 });
  const token = new InMemoryToken({
    address: TOKEN,
    name: "Test Coin",
    symbol: "TST",
    holder: ALICE,
    supply: 1_000_000n,
  });
  chain.deployToken(token);
  chain.credit(ALICE, 1_000n);
  chain.credit(BOB, 1_000n);

  const contract = new SetMintContract(
    COLLECTION,
    {
      name: "Sets",
      symbol: "SET",
      owner: OWNER,
      tokenFee: 0n,
      ethFee: 0n,
      feeAddress: FEE,
      paymentToken: TOKEN,
      baseURI: "a/",
      contractURI: "ipfs://collection",
      maxSupply: 10,
      royaltyNumerator: 500,
      ...overrides,
    },
    { chain, random },
  );
  return { chain, token, contract };
}

/** Deploy and unpause. */
export function deployOpen(
  overrides: Partial<CollectionParams> = {},
  random?: RandomSource,
): Deployment {
  const d = deploy(overrides, random);
  d.contract.pause(OWNER, false);
  return d;
}

/** Run `fn`, expecting a ContractError carrying exactly `failure`. */
export function expectFailure(fn: () => unknown, failure: ContractFailure): ContractError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(ContractError);
    if (!isContractError(err)) throw err;
    expect(err.failure).toEqual(failure);
    return err;
  }
  throw new Error(`expected ${failure.code}, call succeeded`);
}
