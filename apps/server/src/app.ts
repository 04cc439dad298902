import Fastify from "fastify";
import type { FastifyInstance } from "fastify";

import { registerConfigRoutes } from "./routes/config";
import { registerHistoryRoutes } from "./routes/history";
import { registerIngestRoutes } from "./routes/ingest";
import { registerStatusRoutes } from "./routes/status";
import type { EwsRuntime } from "./runtime";

export function registerEwsApp(app: FastifyInstance, runtime: EwsRuntime): void {
  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  registerStatusRoutes(app, runtime);
  registerHistoryRoutes(app, runtime);
  registerIngestRoutes(app, runtime);
  registerConfigRoutes(app, runtime);
}

export function buildApp(runtime: EwsRuntime, opts: { logger?: boolean } = {}): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? true });
  registerEwsApp(app, runtime);
  return app;
}
