/**
 * Health route.
 *
 * GET /health — liveness + current block
 */

import type { FastifyInstance } from "fastify";
import type { NodeContext } from "../context.js";

export function healthRoutes(app: FastifyInstance, ctx: NodeContext): void {
  app.get("/health", async (_request, reply) => {
    const block = ctx.deployment.chain.blockContext;
    return reply.send({
      status: "ok",
      block: block.number,
      timestamp: Date.now(),
    });
  });
}
