/**
 * Event routes.
 *
 * GET /events?from=&type= — committed contract events from sequence `from`
 */

import type { FastifyInstance } from "fastify";
import { EventsQuery } from "../event-log/schemas.js";
import type { NodeContext } from "../context.js";

export function eventRoutes(app: FastifyInstance, ctx: NodeContext): void {
  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (request, reply) => {
      const from = request.query.from ?? 0;
      const events = request.query.type
        ? ctx.events.getEventsByType(request.query.type, from)
        : ctx.events.getEvents(from);
      return reply.send({ events, count: ctx.events.getEventCount() });
    },
  );
}
