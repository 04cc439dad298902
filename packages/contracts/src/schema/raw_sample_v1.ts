import { z } from "zod";

/**
 * RawSampleInputV1Schema
 *
 * Wire form of one crowd-sensor reading as delivered by the feed.
 * Only the envelope (timestamp) is enforced here. Measurement fields are left
 * as unknown on purpose: a missing or ill-typed measurement is an input defect
 * the engine recovers from, not a parse failure.
 */
export const RawSampleInputV1Schema = z
  .object({
    timestamp: z.union([z.string().min(1), z.number().finite()]), // ISO-8601, or unix ms (digit strings included)
    phase: z.string().optional().catch(undefined), // informational scenario tag

    temp_c: z.unknown().optional(),
    rh_pct: z.unknown().optional(),
    density_p_m2: z.unknown().optional(),
    speed_mps: z.unknown().optional(),
    ati: z.unknown().optional(),
    sni: z.unknown().optional(),
    pci: z.unknown().optional(),

    speed_var: z.unknown().optional(),
    push_rate: z.unknown().optional(),
    shout_rate: z.unknown().optional(),
    near_falls: z.unknown().optional(),
  })
  .passthrough();

export type RawSampleInputV1 = z.infer<typeof RawSampleInputV1Schema>;

export type CoreMeasurementField = "temp_c" | "rh_pct" | "density_p_m2" | "speed_mps" | "ati" | "sni" | "pci";
export type AuxSignalField = "speed_var" | "push_rate" | "shout_rate" | "near_falls";

/**
 * RawSampleV1Schema
 *
 * Resolved sample: every core measurement is a finite number (after
 * last-known-good substitution and range clamping), auxiliary signals are
 * number | null. Immutable once produced by the normalizer.
 */
export const RawSampleV1Schema = z
  .object({
    ts: z.number().int().finite(), // unix ms
    phase: z.string().nullable(),

    temp_c: z.number().finite(),
    rh_pct: z.number().finite().min(0).max(100),
    density_p_m2: z.number().finite().nonnegative(),
    speed_mps: z.number().finite().nonnegative(),
    ati: z.number().finite().min(0).max(1),
    sni: z.number().finite().min(0).max(1),
    pci: z.number().finite().min(0).max(1),

    speed_var: z.number().finite().nonnegative().nullable(),
    push_rate: z.number().finite().nonnegative().nullable(),
    shout_rate: z.number().finite().nonnegative().nullable(),
    near_falls: z.number().finite().nonnegative().nullable(),
  })
  .strict();

export type RawSampleV1 = z.infer<typeof RawSampleV1Schema>;

// Largest instant a Date can hold (±100,000,000 days around the epoch).
export const MAX_TIMESTAMP_MS = 8.64e15;

function toTimestampMs(ms: number): number | null {
  return Number.isSafeInteger(ms) && Math.abs(ms) <= MAX_TIMESTAMP_MS ? ms : null;
}

/**
 * Parses the wire timestamp into unix ms. Returns null when it cannot be
 * interpreted or lies outside the Date range (the sample is then rejected,
 * since ordering depends on it).
 *
 * A string of digits is always unix ms, never a year: "2028" is 2028 ms after
 * the epoch. Calendar dates must be sent as ISO-8601 ("2028-01-01T00:00:00Z").
 */
export function parseSampleTimestamp(v: string | number): number | null {
  if (typeof v === "number") {
    return Number.isFinite(v) ? toTimestampMs(Math.trunc(v)) : null;
  }
  const s = v.trim();
  if (/^-?\d+$/.test(s)) return toTimestampMs(Number(s));
  const ms = Date.parse(s);
  return Number.isFinite(ms) ? ms : null;
}
