import type { FastifyInstance } from "fastify";

import { snapshotsToCsv } from "../csv";
import type { EwsRuntime } from "../runtime";
import { parseCountParam } from "../util";
import { unknownZone } from "./status";
import type { ZoneQuery } from "./status";

// 24h at one sample per 5 minutes.
export const DEFAULT_HISTORY_N = 288;

type HistoryQuery = ZoneQuery & { n?: string };

export function registerHistoryRoutes(app: FastifyInstance, runtime: EwsRuntime): void {
  // GET /history?zone=&n=288
  app.get<{ Querystring: HistoryQuery }>("/history", async (req, reply) => {
    const engine = runtime.engine(req.query.zone);
    if (!engine) return reply.code(404).send(unknownZone(req.query.zone));

    const n = parseCountParam(req.query.n, DEFAULT_HISTORY_N);
    if (n === null) return reply.code(400).send({ ok: false, error: "INVALID:n" });

    const history = engine.history(n);
    return reply.send({ zone: engine.zoneId, count: history.length, history });
  });

  // GET /history.csv?zone=&n=288
  app.get<{ Querystring: HistoryQuery }>("/history.csv", async (req, reply) => {
    const engine = runtime.engine(req.query.zone);
    if (!engine) return reply.code(404).send(unknownZone(req.query.zone));

    const n = parseCountParam(req.query.n, DEFAULT_HISTORY_N);
    if (n === null) return reply.code(400).send({ ok: false, error: "INVALID:n" });

    return reply
      .header("content-type", "text/csv; charset=utf-8")
      .header("content-disposition", `attachment; filename="ews_history_${engine.zoneId}.csv"`)
      .send(snapshotsToCsv(engine.history(n)));
  });
}
