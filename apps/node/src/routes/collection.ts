/**
 * Collection routes — reads and the mint entry point.
 *
 * GET  /collection        — CollectionV1 summary
 * GET  /sets/:set         — one set's cap, counter and base URI
 * GET  /quote?quantity=   — total fees for a mint of `quantity`
 * GET  /royalty?price=    — royalty receiver and amount for a sale price
 * POST /mint              — { caller, quantity, value? }
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { AmountV1 } from "@setmint/contract";
import { CallerField, toWire, type NodeContext } from "../context.js";

const SetParams = Type.Object({ set: Type.Integer({ minimum: 0 }) });
type SetParams = Static<typeof SetParams>;

const QuoteQuery = Type.Object({ quantity: Type.Integer({ minimum: 0 }) });
type QuoteQuery = Static<typeof QuoteQuery>;

const RoyaltyQuery = Type.Object({ price: AmountV1 });
type RoyaltyQuery = Static<typeof RoyaltyQuery>;

const MintBody = Type.Object({
  ...CallerField,
  quantity: Type.Integer({ minimum: 0 }),
  value: Type.Optional(AmountV1),
});
type MintBody = Static<typeof MintBody>;

export function collectionRoutes(app: FastifyInstance, ctx: NodeContext): void {
  const { contract } = ctx.deployment;

  app.get("/collection", async (_request, reply) => {
    return reply.send(contract.describe());
  });

  app.get<{ Params: SetParams }>(
    "/sets/:set",
    { schema: { params: SetParams } },
    async (request, reply) => {
      const info = contract.setInfo(request.params.set);
      if (!info) {
        return reply.status(404).send({ error: "set_not_found", set: request.params.set });
      }
      return reply.send(info);
    },
  );

  app.get<{ Querystring: QuoteQuery }>(
    "/quote",
    { schema: { querystring: QuoteQuery } },
    async (request, reply) => {
      const { quantity } = request.query;
      return reply.send(toWire({ quantity, ...contract.quoteFees(quantity) }));
    },
  );

  app.get<{ Querystring: RoyaltyQuery }>(
    "/royalty",
    { schema: { querystring: RoyaltyQuery } },
    async (request, reply) => {
      return reply.send(toWire(contract.royaltyInfo(BigInt(request.query.price))));
    },
  );

  /**
   * POST /mint — mint `quantity` units to the caller.
   * `value` is the native amount attached; anything beyond the native fee
   * stays with the collection.
   */
  app.post<{ Body: MintBody }>(
    "/mint",
    { schema: { body: MintBody } },
    async (request, reply) => {
      const { caller, quantity, value } = request.body;
      const receipt = contract.mint(
        { caller, value: value === undefined ? 0n : BigInt(value) },
        quantity,
      );
      request.log.info(
        { minter: caller, set: receipt.set, tokenIds: receipt.tokenIds },
        "minted",
      );
      return reply.send(toWire(receipt));
    },
  );
}
