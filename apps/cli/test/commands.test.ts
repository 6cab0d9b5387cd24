/**
 * CLI commands against a stubbed node.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mintCommand } from "../src/commands/mint.js";
import { tokenCommand } from "../src/commands/token.js";
import { approveCommand } from "../src/commands/approve.js";
import { NodeRequestError } from "../src/lib/http.js";

const NODE = "http://node.test";
const ALICE = "0x" + "44".repeat(20);
const config = { node: NODE, address: ALICE };

interface Call {
  url: string;
  method: string;
  body: unknown;
}

let calls: Call[];
let logged: string[];

function stubNode(routes: Record<string, { status?: number; body: unknown }>) {
  vi.stubGlobal(
    "fetch",
    vi.fn(async (url: string, init?: RequestInit) => {
      const method = init?.method ?? "GET";
      calls.push({
        url,
        method,
        body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
      });
      const key = `${method} ${url.replace(NODE, "")}`;
      const route = routes[key];
      if (!route) return new Response(JSON.stringify({ error: "not_found" }), { status: 404 });
      return new Response(JSON.stringify(route.body), { status: route.status ?? 200 });
    }),
  );
}

beforeEach(() => {
  calls = [];
  logged = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logged.push(args.join(" "));
  });
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

const receipt = {
  tokenIds: [1, 2],
  set: 0,
  displayNumbers: [0, 9],
  fees: { ethFee: "20", tokenFee: "10" },
  blockNumber: 4,
};

describe("mint", () => {
  it("attaches the quoted native fee when no value is given", async () => {
    stubNode({
      "GET /quote?quantity=2": { body: { quantity: 2, ethFee: "20", tokenFee: "10" } },
      "POST /mint": { body: receipt },
    });
    const result = await mintCommand("2", config);
    expect(result).toEqual(receipt);
    expect(calls[1]).toEqual({
      url: `${NODE}/mint`,
      method: "POST",
      body: { caller: ALICE, quantity: 2, value: "20" },
    });
    expect(logged).toContain("  #2  display 9");
  });

  it("sends an explicit value without quoting", async () => {
    stubNode({ "POST /mint": { body: receipt } });
    await mintCommand("2", config, { value: "50" });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.body).toEqual({ caller: ALICE, quantity: 2, value: "50" });
  });

  it("surfaces the node's error code", async () => {
    stubNode({
      "POST /mint": {
        status: 422,
        body: { error: "ContractPaused", kind: "precondition", detail: {} },
      },
    });
    const err = await mintCommand("1", config, { value: "0" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NodeRequestError);
    expect(err).toMatchObject({ status: 422, code: "ContractPaused" });
  });

  it("validates quantity locally", async () => {
    stubNode({});
    await expect(mintCommand("0", config)).rejects.toThrow("positive integer");
    await expect(mintCommand("1", config, { value: "1.5" })).rejects.toThrow("whole number");
    expect(calls).toHaveLength(0);
  });

  it("needs an address", async () => {
    await expect(mintCommand("1", { node: NODE })).rejects.toThrow("No address configured");
  });
});

describe("token", () => {
  it("prints the token", async () => {
    stubNode({
      "GET /tokens/2": {
        body: {
          tokenId: 2,
          owner: ALICE,
          set: 0,
          displayNumber: 9,
          uri: "a/9",
          approved: "0x" + "0".repeat(40),
        },
      },
    });
    await tokenCommand("2", config);
    expect(logged).toEqual([
      "Token #2",
      `  owner:    ${ALICE}`,
      "  set:      0",
      "  display:  9",
      "  uri:      a/9",
    ]);
  });

  it("rejects an unexpected response shape", async () => {
    stubNode({ "GET /tokens/2": { body: { tokenId: "two" } } });
    await expect(tokenCommand("2", config)).rejects.toThrow("Unexpected response");
  });
});

describe("approve", () => {
  it("posts the allowance for the configured address", async () => {
    stubNode({
      "POST /payment-token/approve": {
        body: { owner: ALICE, spender: "0x" + "66".repeat(20), allowance: "100" },
      },
    });
    await approveCommand("100", config);
    expect(calls[0]?.body).toEqual({ caller: ALICE, amount: "100" });
    expect(logged).toEqual([`Allowance for ${"0x" + "66".repeat(20)}: 100`]);
  });
});
