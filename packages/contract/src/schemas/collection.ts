/**
 * Read-side wire types — what a node returns for collection, set and token
 * queries.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressV1, AmountV1, Count } from "./primitives.js";

export const SetV1 = Type.Object(
  {
    set: Count,
    maxSupply: Count,
    counter: Count,
    baseURI: Type.String(),
    active: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type SetV1 = Static<typeof SetV1>;

export const CollectionV1 = Type.Object(
  {
    address: AddressV1,
    name: Type.String(),
    symbol: Type.String(),
    owner: AddressV1,
    paymentToken: AddressV1,
    paused: Type.Boolean(),
    batchLimit: Count,
    ethFee: AmountV1,
    tokenFee: AmountV1,
    feeAddress: AddressV1,
    contractURI: Type.String(),
    royalty: Type.Object({ receiver: AddressV1, numerator: Count }),
    currentSet: Count,
    remainingInSet: Count,
    totalMinted: Count,
    totalSupply: Count,
    totalMaxSupply: Count,
    sets: Type.Array(SetV1),
  },
  { additionalProperties: false },
);

export type CollectionV1 = Static<typeof CollectionV1>;

export const TokenV1 = Type.Object(
  {
    tokenId: Type.Integer({ minimum: 1 }),
    owner: AddressV1,
    set: Count,
    displayNumber: Count,
    uri: Type.String(),
  },
  { additionalProperties: false },
);

export type TokenV1 = Static<typeof TokenV1>;
