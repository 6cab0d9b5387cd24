/**
 * DeployArgsV1 — the constructor bundle a deployment supplies per network.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MAX_BATCH_LIMIT, ROYALTY_FEE_DENOMINATOR } from "../constants.js";
import { AddressV1, AmountV1, Count } from "./primitives.js";

export const DeployArgsV1 = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    symbol: Type.String({ minLength: 1 }),
    owner: AddressV1,
    tokenFee: AmountV1,
    ethFee: AmountV1,
    feeAddress: AddressV1,
    paymentToken: AddressV1,
    baseURI: Type.String(),
    contractURI: Type.String(),
    maxSupply: Count,
    royaltyNumerator: Type.Integer({ minimum: 0, maximum: ROYALTY_FEE_DENOMINATOR }),
    batchLimit: Type.Optional(Type.Integer({ minimum: 0, maximum: MAX_BATCH_LIMIT })),
  },
  { additionalProperties: false },
);

export type DeployArgsV1 = Static<typeof DeployArgsV1>;

/** Validate an untrusted bundle; returns the first problems found. */
export function checkDeployArgs(
  input: unknown,
): { valid: true; args: DeployArgsV1 } | { valid: false; errors: string[] } {
  if (Value.Check(DeployArgsV1, input)) {
    return { valid: true, args: input };
  }
  const errors = [...Value.Errors(DeployArgsV1, input)]
    .slice(0, 5)
    .map((e) => `${e.path || "/"}: ${e.message}`);
  return { valid: false, errors };
}
