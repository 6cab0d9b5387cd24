/**
 * Token routes.
 *
 * GET  /tokens/:id            — owner, set, display number, URI
 * POST /tokens/:id/transfer   — { caller, to, from? }  (from defaults to the owner)
 * POST /tokens/:id/approve    — { caller, approved }
 * POST /tokens/:id/burn       — { caller }
 * POST /operators             — { caller, operator, approved }
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { AddressV1 } from "@setmint/contract";
import { CallerField, TokenIdParams, type NodeContext } from "../context.js";

const TransferBody = Type.Object({
  ...CallerField,
  to: AddressV1,
  from: Type.Optional(AddressV1),
});
type TransferBody = Static<typeof TransferBody>;

const ApproveBody = Type.Object({ ...CallerField, approved: AddressV1 });
type ApproveBody = Static<typeof ApproveBody>;

const CallerBody = Type.Object(CallerField);
type CallerBody = Static<typeof CallerBody>;

const OperatorBody = Type.Object({
  ...CallerField,
  operator: AddressV1,
  approved: Type.Boolean(),
});
type OperatorBody = Static<typeof OperatorBody>;

export function tokenRoutes(app: FastifyInstance, ctx: NodeContext): void {
  const { contract } = ctx.deployment;

  app.get<{ Params: TokenIdParams }>(
    "/tokens/:id",
    { schema: { params: TokenIdParams } },
    async (request, reply) => {
      return reply.send({
        ...contract.token(request.params.id),
        approved: contract.getApproved(request.params.id),
      });
    },
  );

  app.post<{ Params: TokenIdParams; Body: TransferBody }>(
    "/tokens/:id/transfer",
    { schema: { params: TokenIdParams, body: TransferBody } },
    async (request, reply) => {
      const { id } = request.params;
      const { caller, to } = request.body;
      const from = request.body.from ?? contract.ownerOf(id);
      contract.transferFrom(caller, from, to, id);
      return reply.send({ tokenId: id, owner: contract.ownerOf(id) });
    },
  );

  app.post<{ Params: TokenIdParams; Body: ApproveBody }>(
    "/tokens/:id/approve",
    { schema: { params: TokenIdParams, body: ApproveBody } },
    async (request, reply) => {
      const { id } = request.params;
      contract.approve(request.body.caller, request.body.approved, id);
      return reply.send({ tokenId: id, approved: contract.getApproved(id) });
    },
  );

  app.post<{ Params: TokenIdParams; Body: CallerBody }>(
    "/tokens/:id/burn",
    { schema: { params: TokenIdParams, body: CallerBody } },
    async (request, reply) => {
      const { id } = request.params;
      contract.burn(request.body.caller, id);
      request.log.info({ tokenId: id }, "burned");
      return reply.send({ tokenId: id, burned: true });
    },
  );

  app.post<{ Body: OperatorBody }>(
    "/operators",
    { schema: { body: OperatorBody } },
    async (request, reply) => {
      const { caller, operator, approved } = request.body;
      contract.setApprovalForAll(caller, operator, approved);
      return reply.send({ owner: caller, operator, approved });
    },
  );
}
