/**
 * Deployment — build a chain, its payment token and the collection from a
 * deploy file.
 *
 * Deploy file (JSON):
 *   {
 *     "collection": DeployArgsV1,
 *     "address":    collection address (optional, derived from a label),
 *     "token":      in-process payment token { address, name, symbol, decimals?, holder, supply },
 *     "genesis":    [{ "address", "balance" }] native allocations,
 *     "chain":      { "timestamp"?, "prevrandao"? }
 *   }
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { Chain, InMemoryToken, addressFromLabel } from "@setmint/ledger";
import {
  AddressV1,
  AmountV1,
  SetMintContract,
  checkDeployArgs,
  type DeployArgsV1,
  type RandomSource,
} from "@setmint/contract";

export const DeployFileV1 = Type.Object(
  {
    collection: Type.Unknown(),
    address: Type.Optional(AddressV1),
    token: Type.Object({
      address: AddressV1,
      name: Type.String({ minLength: 1 }),
      symbol: Type.String({ minLength: 1 }),
      decimals: Type.Optional(Type.Integer({ minimum: 0, maximum: 36 })),
      holder: AddressV1,
      supply: AmountV1,
    }),
    genesis: Type.Optional(Type.Array(Type.Object({ address: AddressV1, balance: AmountV1 }))),
    chain: Type.Optional(
      Type.Object({
        timestamp: Type.Optional(Type.Integer({ minimum: 0 })),
        prevrandao: Type.Optional(Type.String({ pattern: "^[0-9a-f]{64}$" })),
      }),
    ),
  },
  { additionalProperties: false },
);

export type DeployFileV1 = Static<typeof DeployFileV1>;

export interface Deployment {
  chain: Chain;
  token: InMemoryToken;
  contract: SetMintContract;
  args: DeployArgsV1;
}

export class DeployConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid deploy config: ${problems.join("; ")}`);
    this.name = "DeployConfigError";
  }
}

const DEFAULT_COLLECTION_LABEL = "setmint-collection";

/** Validate and deploy. Throws DeployConfigError on a malformed file. */
export function deploy(input: unknown, random?: RandomSource): Deployment {
  if (!Value.Check(DeployFileV1, input)) {
    throw new DeployConfigError(
      [...Value.Errors(DeployFileV1, input)].slice(0, 5).map((e) => `${e.path || "/"}: ${e.message}`),
    );
  }
  const checked = checkDeployArgs(input.collection);
  if (!checked.valid) {
    throw new DeployConfigError(checked.errors.map((e) => `collection${e}`));
  }
  const args = checked.args;

  const chain = new Chain(input.chain ?? {});
  for (const { address, balance } of input.genesis ?? []) {
    chain.credit(address, BigInt(balance));
  }

  const token = new InMemoryToken({
    ...input.token,
    supply: BigInt(input.token.supply),
  });
  chain.deployToken(token);

  const contract = new SetMintContract(
    input.address ?? addressFromLabel(DEFAULT_COLLECTION_LABEL),
    {
      ...args,
      tokenFee: BigInt(args.tokenFee),
      ethFee: BigInt(args.ethFee),
    },
    { chain, random },
  );

  return { chain, token, contract, args };
}

/** Read a deploy file from disk and deploy it. */
export async function deployFromFile(path: string, random?: RandomSource): Promise<Deployment> {
  const raw = await readFile(path, "utf8");
  return deploy(JSON.parse(raw), random);
}
