/**
 * Account routes — balances and payment-token allowance.
 *
 * GET  /accounts/:address        — native, payment-token and collection balances
 * POST /payment-token/approve    — { caller, amount } approve the collection to pull fees
 * POST /faucet                   — { address, amount } dev-only native credit
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { AddressV1, AmountV1 } from "@setmint/contract";
import { CallerField, toWire, type NodeContext } from "../context.js";

const AccountParams = Type.Object({ address: AddressV1 });
type AccountParams = Static<typeof AccountParams>;

const ApproveBody = Type.Object({ ...CallerField, amount: AmountV1 });
type ApproveBody = Static<typeof ApproveBody>;

const FaucetBody = Type.Object({ address: AddressV1, amount: AmountV1 });
type FaucetBody = Static<typeof FaucetBody>;

export function accountRoutes(app: FastifyInstance, ctx: NodeContext): void {
  const { chain, token, contract } = ctx.deployment;

  app.get<{ Params: AccountParams }>(
    "/accounts/:address",
    { schema: { params: AccountParams } },
    async (request, reply) => {
      const address = request.params.address.toLowerCase();
      return reply.send(
        toWire({
          address,
          native: chain.balanceOf(address),
          paymentToken: {
            address: token.address,
            symbol: token.symbol,
            balance: token.balanceOf(address),
            allowance: token.allowance(address, contract.address),
          },
          tokens: contract.balanceOf(address),
        }),
      );
    },
  );

  app.post<{ Body: ApproveBody }>(
    "/payment-token/approve",
    { schema: { body: ApproveBody } },
    async (request, reply) => {
      const { caller, amount } = request.body;
      const ok = token.approve(caller, contract.address, BigInt(amount));
      if (!ok) {
        return reply.status(422).send({ error: "approve_failed" });
      }
      return reply.send(
        toWire({ owner: caller.toLowerCase(), spender: contract.address, allowance: token.allowance(caller, contract.address) }),
      );
    },
  );

  app.post<{ Body: FaucetBody }>(
    "/faucet",
    { schema: { body: FaucetBody } },
    async (request, reply) => {
      const { address, amount } = request.body;
      chain.credit(address, BigInt(amount));
      return reply.send(toWire({ address: address.toLowerCase(), native: chain.balanceOf(address) }));
    },
  );
}
