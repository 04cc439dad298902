#!/usr/bin/env node
/**
 * Offline replay of a raw-sample CSV through one engine.
 *
 * - reference time for TI/EI is each sample's own timestamp
 * - rejected rows are reported on stderr and skipped
 * - --out writes the resulting snapshot history as CSV
 *
 * Usage:
 *   npm run replay -- --file ./samples.csv --out ./risk.csv --zone main [--config ./config/ews/default.json]
 */

import fs from "node:fs";
import path from "node:path";

import { EngineConfigRejected, admitEngineConfig, createRiskEngine, sampleClock } from "@ews/risk-engine";
import type { RiskSnapshotV1 } from "@ews/contracts";

import { parseRawSamplesCsv, snapshotsToCsv } from "../apps/server/src/csv";
import { CONFIG_RELATIVE_PATH, findRepoRoot, readConfigFile } from "../apps/server/src/env";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function main(): void {
  const filePath = arg("--file");
  if (!filePath) die("Missing --file");

  const absFile = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(absFile)) die(`File not found: ${absFile}`);

  const configArg = arg("--config");
  const configPath = configArg
    ? path.resolve(process.cwd(), configArg)
    : path.join(findRepoRoot(process.cwd(), CONFIG_RELATIVE_PATH), CONFIG_RELATIVE_PATH);

  const zoneArg = arg("--zone");
  const engine = createRiskEngine(admitEngineConfig(readConfigFile(configPath)), {
    clock: sampleClock,
    ...(zoneArg ? { zoneId: zoneArg } : {}),
  });

  const rows = parseRawSamplesCsv(fs.readFileSync(absFile, "utf8"));
  if (rows.length === 0) die(`Parsed 0 rows from file: ${absFile}`);

  // history() is bounded by the configured capacity; keep every snapshot for --out.
  const produced: RiskSnapshotV1[] = [];
  rows.forEach((row, i) => {
    const out = engine.ingest(row);
    if (out.status === "rejected") {
      console.error(`row ${i + 2}: ${out.code} ${out.message}`);
      return;
    }
    produced.push(out.snapshot);
  });

  const outPath = arg("--out");
  if (outPath) fs.writeFileSync(path.resolve(process.cwd(), outPath), snapshotsToCsv(produced));

  const s = engine.stats();
  const last = engine.latest();
  console.log(
    `zone=${engine.zoneId} rows=${rows.length} accepted=${s.accepted} degraded=${s.degraded} rejected=${s.rejected}` +
      ` final_alert=${last ? last.alert_level : "n/a"}` +
      (outPath ? ` out=${outPath}` : "")
  );
}

try {
  main();
} catch (err) {
  if (err instanceof EngineConfigRejected) {
    die(`engine configuration rejected: ${err.errors.map((e) => `${e.code}@${e.path}: ${e.message}`).join("; ")}`);
  }
  throw err;
}
