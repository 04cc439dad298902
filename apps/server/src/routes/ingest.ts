import type { FastifyInstance } from "fastify";

import type { EwsRuntime } from "../runtime";
import { unknownZone } from "./status";
import type { ZoneQuery } from "./status";

export function registerIngestRoutes(app: FastifyInstance, runtime: EwsRuntime): void {
  // POST /api/ingest?zone=
  // Body: one raw sample. Defects are recovered (200, status "degraded");
  // unusable or out-of-order samples are refused (422) and change nothing.
  app.post<{ Querystring: ZoneQuery }>("/api/ingest", async (req, reply) => {
    const engine = runtime.engine(req.query.zone);
    if (!engine) return reply.code(404).send(unknownZone(req.query.zone));

    const out = engine.ingest(req.body);
    const zone = engine.zoneId;

    if (out.status === "rejected") {
      req.log.warn({ zone, code: out.code, detail: out.message }, "sample rejected");
      return reply.code(422).send({ ok: false, zone, status: out.status, code: out.code, message: out.message });
    }

    const { snapshot } = out;
    if (out.status === "degraded") {
      req.log.warn({ zone, seq: snapshot.seq, defects: snapshot.defects }, "sample degraded");
    }
    if (snapshot.alert_transition) {
      req.log.info({ zone, seq: snapshot.seq, ...snapshot.alert_transition, risk: snapshot.extended_risk }, "alert level changed");
    }
    return reply.send({ ok: true, zone, status: out.status, snapshot });
  });
}
