// apps/server/src/csv.ts
//
// CSV export of snapshot history and CSV import of raw samples for replays.
// Export is one header line plus one line per snapshot, "\n" terminated.

import type { RiskSnapshotV1 } from "@ews/contracts";

export const SNAPSHOT_CSV_COLUMNS = [
  "timestamp",
  "zone",
  "phase",
  "temp_c",
  "rh_pct",
  "density_p_m2",
  "speed_mps",
  "CAI",
  "CDI",
  "THI",
  "TI",
  "EI",
  "ATI",
  "SNI",
  "PCI",
  "BI",
  "physical_risk",
  "extended_risk",
  "alert",
  "degraded",
] as const;

export function csvField(v: string): string {
  if (/[",\r\n]/.test(v)) return `"${v.replace(/"/g, '""')}"`;
  return v;
}

const score = (x: number): string => x.toFixed(3);
const measurement = (x: number): string => x.toFixed(2);

function snapshotRow(s: RiskSnapshotV1): string[] {
  const { sample, indices } = s;
  return [
    s.timestamp_iso,
    s.zone_id,
    s.phase ?? "",
    measurement(sample.temp_c),
    measurement(sample.rh_pct),
    measurement(sample.density_p_m2),
    measurement(sample.speed_mps),
    score(indices.CAI),
    score(indices.CDI),
    score(indices.THI),
    score(indices.TI),
    score(indices.EI),
    score(indices.ATI),
    score(indices.SNI),
    score(indices.PCI),
    score(s.BI),
    score(s.physical_risk),
    score(s.extended_risk),
    s.alert_level,
    s.degraded ? "1" : "0",
  ];
}

export function snapshotsToCsv(snapshots: ReadonlyArray<RiskSnapshotV1>): string {
  const lines = [SNAPSHOT_CSV_COLUMNS.join(",")];
  for (const s of snapshots) lines.push(snapshotRow(s).map(csvField).join(","));
  return lines.join("\n") + "\n";
}

/** Splits one CSV line, honouring double-quoted fields and "" escapes. */
export function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let cur = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cur += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cur += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      out.push(cur);
      cur = "";
    } else {
      cur += ch;
    }
  }
  out.push(cur);
  return out;
}

const NUMERIC = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

function cellValue(raw: string): string | number | undefined {
  const s = raw.trim();
  if (s === "" || s.toUpperCase() === "NA") return undefined;
  return NUMERIC.test(s) ? Number(s) : s;
}

/**
 * Parses a CSV of raw samples. The header names the wire fields.
 * Empty and NA cells are dropped (missing), numeric cells become numbers,
 * anything else is kept as a string for the engine to judge.
 */
export function parseRawSamplesCsv(text: string): Record<string, unknown>[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);
  if (!lines.length) return [];

  const header = splitCsvLine(lines[0]).map((h) => h.trim());
  const rows: Record<string, unknown>[] = [];

  for (const line of lines.slice(1)) {
    const cells = splitCsvLine(line);
    const row: Record<string, unknown> = {};
    header.forEach((col, i) => {
      if (!col) return;
      const v = cellValue(cells[i] ?? "");
      if (v !== undefined) row[col] = v;
    });
    rows.push(row);
  }
  return rows;
}
