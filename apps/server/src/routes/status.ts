import type { FastifyInstance } from "fastify";

import type { EwsRuntime } from "../runtime";
import { toStatusView } from "../views";

export type ZoneQuery = { zone?: string };

export function unknownZone(zone: unknown): { ok: false; error: string } {
  return { ok: false, error: `UNKNOWN_ZONE:${String(zone)}` };
}

export function registerStatusRoutes(app: FastifyInstance, runtime: EwsRuntime): void {
  app.get("/health", async (_req, reply) => {
    return reply.send({ ok: true, zones: runtime.zones() });
  });

  app.get("/api/zones", async (_req, reply) => {
    const zones = runtime.zones().map((zone) => {
      const engine = runtime.engine(zone);
      return {
        zone,
        default: zone === runtime.defaultZone,
        alert_level: engine ? engine.alertState().level : "GREEN",
        stats: engine ? engine.stats() : null,
      };
    });
    return reply.send({ zones });
  });

  // GET /status?zone=
  // Latest snapshot as the flat dashboard record.
  app.get<{ Querystring: ZoneQuery }>("/status", async (req, reply) => {
    const engine = runtime.engine(req.query.zone);
    if (!engine) return reply.code(404).send(unknownZone(req.query.zone));

    const latest = engine.latest();
    if (!latest) return reply.code(404).send({ ok: false, error: `NO_DATA:${engine.zoneId}` });
    return reply.send(toStatusView(latest));
  });
}
