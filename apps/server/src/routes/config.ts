import type { FastifyInstance } from "fastify";

import type { EwsRuntime } from "../runtime";

export function registerConfigRoutes(app: FastifyInstance, runtime: EwsRuntime): void {
  // GET /api/config
  // Effective configuration (defaults filled) and its fingerprint.
  app.get("/api/config", async (_req, reply) => {
    return reply.send({
      schema_version: runtime.config.schema_version,
      config_hash: runtime.configHash,
      config: runtime.config,
    });
  });
}
