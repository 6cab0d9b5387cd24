/**
 * Admin routes — owner-gated configuration. The contract checks the caller;
 * these routes only decode bodies.
 *
 * POST /admin/token-fee           { caller, fee }
 * POST /admin/eth-fee             { caller, fee }
 * POST /admin/fee-address         { caller, feeAddress }
 * POST /admin/batch-limit         { caller, batchLimit }
 * POST /admin/base-uri            { caller, set, maxSupply, counter, uri }
 * POST /admin/contract-uri        { caller, uri }
 * POST /admin/royalty             { caller, receiver, numerator }
 * POST /admin/pause               { caller, paused }
 * POST /admin/start-set           { caller, set }
 * POST /admin/withdraw-eth        { caller, receiver }
 * POST /admin/withdraw-tokens     { caller, token, receiver }
 * POST /admin/transfer-ownership  { caller, newOwner }
 * POST /admin/renounce-ownership  { caller }
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static, type TObject } from "@sinclair/typebox";
import { AddressV1, AmountV1 } from "@setmint/contract";
import { CallerField, toWire, type NodeContext } from "../context.js";

const Count = Type.Integer({ minimum: 0 });

const FeeBody = Type.Object({ ...CallerField, fee: AmountV1 });
const FeeAddressBody = Type.Object({ ...CallerField, feeAddress: AddressV1 });
const BatchLimitBody = Type.Object({ ...CallerField, batchLimit: Count });
const BaseURIBody = Type.Object({
  ...CallerField,
  set: Count,
  maxSupply: Count,
  counter: Count,
  uri: Type.String(),
});
const ContractURIBody = Type.Object({ ...CallerField, uri: Type.String() });
const RoyaltyBody = Type.Object({ ...CallerField, receiver: AddressV1, numerator: Count });
const PauseBody = Type.Object({ ...CallerField, paused: Type.Boolean() });
const StartSetBody = Type.Object({ ...CallerField, set: Count });
const WithdrawEthBody = Type.Object({ ...CallerField, receiver: AddressV1 });
const WithdrawTokensBody = Type.Object({ ...CallerField, token: AddressV1, receiver: AddressV1 });
const OwnershipBody = Type.Object({ ...CallerField, newOwner: AddressV1 });
const CallerBody = Type.Object(CallerField);

export function adminRoutes(app: FastifyInstance, ctx: NodeContext): void {
  const { contract } = ctx.deployment;

  /** Register one admin route: decode, apply, log, answer with the collection summary. */
  function route<S extends TObject>(
    path: string,
    body: S,
    apply: (input: Static<S>) => unknown,
  ): void {
    app.post<{ Body: Static<S> }>(
      `/admin/${path}`,
      { schema: { body } },
      async (request, reply) => {
        const result = apply(request.body);
        request.log.info({ action: path }, "admin call");
        return reply.send({
          ok: true,
          result: result === undefined ? null : toWire(result),
          collection: contract.describe(),
        });
      },
    );
  }

  route("token-fee", FeeBody, (b) => contract.setTokenFee(b.caller, BigInt(b.fee)));
  route("eth-fee", FeeBody, (b) => contract.setEthFee(b.caller, BigInt(b.fee)));
  route("fee-address", FeeAddressBody, (b) => contract.setFeeAddress(b.caller, b.feeAddress));
  route("batch-limit", BatchLimitBody, (b) => contract.setBatchLimit(b.caller, b.batchLimit));
  route("base-uri", BaseURIBody, (b) =>
    contract.setBaseURI(b.caller, b.set, b.maxSupply, b.counter, b.uri),
  );
  route("contract-uri", ContractURIBody, (b) => contract.setContractURI(b.caller, b.uri));
  route("royalty", RoyaltyBody, (b) => contract.setRoyalty(b.caller, b.receiver, b.numerator));
  route("pause", PauseBody, (b) => contract.pause(b.caller, b.paused));
  route("start-set", StartSetBody, (b) => contract.startSet(b.caller, b.set));
  route("withdraw-eth", WithdrawEthBody, (b) => contract.withdrawETH(b.caller, b.receiver));
  route("withdraw-tokens", WithdrawTokensBody, (b) =>
    contract.withdrawTokens(b.caller, b.token, b.receiver),
  );
  route("transfer-ownership", OwnershipBody, (b) =>
    contract.transferOwnership(b.caller, b.newOwner),
  );
  route("renounce-ownership", CallerBody, (b) => contract.renounceOwnership(b.caller));
}
