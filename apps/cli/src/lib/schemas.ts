/**
 * Response schemas for the node endpoints the CLI calls.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AmountV1 } from "@setmint/contract";

export const MintResponse = Type.Object({
  tokenIds: Type.Array(Type.Integer()),
  set: Type.Integer(),
  displayNumbers: Type.Array(Type.Integer()),
  fees: Type.Object({ ethFee: AmountV1, tokenFee: AmountV1 }),
  blockNumber: Type.Integer(),
});
export type MintResponse = Static<typeof MintResponse>;

export const QuoteResponse = Type.Object({
  quantity: Type.Integer(),
  ethFee: AmountV1,
  tokenFee: AmountV1,
});

export const TokenResponse = Type.Object({
  tokenId: Type.Integer(),
  owner: Type.String(),
  set: Type.Integer(),
  displayNumber: Type.Integer(),
  uri: Type.String(),
  approved: Type.String(),
});

export const AccountResponse = Type.Object({
  address: Type.String(),
  native: AmountV1,
  paymentToken: Type.Object({
    address: Type.String(),
    symbol: Type.String(),
    balance: AmountV1,
    allowance: AmountV1,
  }),
  tokens: Type.Integer(),
});

export const ApproveResponse = Type.Object({
  owner: Type.String(),
  spender: Type.String(),
  allowance: AmountV1,
});
