/**
 * Node server — hosts one chain and one deployed collection over HTTP.
 *
 * Routes:
 *   GET  /health                — liveness + current block
 *   GET  /collection            — collection summary
 *   GET  /sets/:set             — one set
 *   GET  /quote?quantity=       — fee quote
 *   GET  /royalty?price=        — royalty quote
 *   POST /mint                  — mint to the caller
 *   GET  /tokens/:id            — token details
 *   POST /tokens/:id/transfer   — transfer
 *   POST /tokens/:id/approve    — single-token approval
 *   POST /tokens/:id/burn       — burn
 *   POST /operators             — operator approval
 *   GET  /accounts/:address     — balances
 *   POST /payment-token/approve — let the collection pull token fees
 *   POST /faucet                — dev native credit
 *   GET  /events                — committed contract events
 *   POST /admin/*               — owner-gated configuration
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import type { RandomSource } from "@setmint/contract";
import { config } from "./config.js";
import { deployFromFile, type Deployment } from "./deploy.js";
import { EventStore } from "./event-log/writer.js";
import { createBlockProducer } from "./block-producer.js";
import { handleError } from "./errors.js";
import type { NodeContext } from "./context.js";
import { healthRoutes } from "./routes/health.js";
import { collectionRoutes } from "./routes/collection.js";
import { tokenRoutes } from "./routes/tokens.js";
import { accountRoutes } from "./routes/accounts.js";
import { eventRoutes } from "./routes/events.js";
import { adminRoutes } from "./routes/admin.js";

export interface NodeDeps {
  /** Pre-built deployment (tests). Default: read config.deployConfig. */
  deployment?: Deployment;
  random?: RandomSource;
  /** Block interval override. 0 = no timer. */
  blockIntervalMs?: number;
  logger?: boolean;
}

export async function buildApp(deps?: NodeDeps) {
  const deployment =
    deps?.deployment ?? (await deployFromFile(resolve(config.deployConfig), deps?.random));
  const app = Fastify({
    logger: deps?.logger === false ? false : { level: config.logLevel },
  });

  const ctx: NodeContext = {
    deployment,
    events: new EventStore(deployment.contract),
  };

  const blockIntervalMs = deps?.blockIntervalMs ?? config.blockIntervalMs;
  const producer = createBlockProducer(deployment.chain, {
    intervalMs: blockIntervalMs,
    onBlock: (block) => {
      const appended = ctx.events.sync();
      if (appended.length > 0) {
        app.log.debug({ block: block.number, events: appended.length }, "block sealed");
      }
    },
    onError: (err) => {
      app.log.error({ err }, "block producer error");
    },
  });

  app.addHook("onClose", async () => {
    producer.stop();
  });

  app.setErrorHandler(handleError);

  healthRoutes(app, ctx);
  collectionRoutes(app, ctx);
  tokenRoutes(app, ctx);
  accountRoutes(app, ctx);
  eventRoutes(app, ctx);
  adminRoutes(app, ctx);

  producer.start();
  app.log.info(
    {
      collection: deployment.contract.address,
      name: deployment.contract.name,
      blockIntervalMs,
    },
    "collection deployed",
  );

  return app;
}

// ── Start (only when run directly, not when imported by tests) ─────

const isMain =
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMain) {
  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
