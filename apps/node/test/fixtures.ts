/**
 * Test deployment for the node: fixed addresses, word-0 draws.
 */

import { sequenceSource } from "@setmint/contract";
import { deploy, type Deployment } from "../src/deploy.js";

export const OWNER = "0x" + "11".repeat(20);
export const FEE = "0x" + "22".repeat(20);
export const TOKEN = "0x" + "33".repeat(20);
export const ALICE = "0x" + "44".repeat(20);
export const BOB = "0x" + "55".repeat(20);
export const COLLECTION = "0x" + "66".repeat(20);

export function deployFile(collection: Record<string, unknown> = {}) {
  return {
    collection: {
      name: "Sets",
      symbol: "SET",
      owner: OWNER,
      tokenFee: "5",
      ethFee: "10",
      feeAddress: FEE,
      paymentToken: TOKEN,
      baseURI: "a/",
      contractURI: "ipfs://collection",
      maxSupply: 10,
      royaltyNumerator: 500,
      ...collection,
    },
    address: COLLECTION,
    token: {
      address: TOKEN,
      name: "Test Coin",
      symbol: "TST",
      holder: ALICE,
      supply: "1000000",
    },
    genesis: [
      { address: ALICE, balance: "1000" },
      { address: BOB, balance: "1000" },
    ],
    chain: { timestamp: 1_700_000_000_000 },
  };
}

export function testDeployment(collection: Record<string, unknown> = {}): Deployment {
  return deploy(deployFile(collection), sequenceSource([0n]));
}
