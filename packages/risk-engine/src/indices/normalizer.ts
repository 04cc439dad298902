// packages/risk-engine/src/indices/normalizer.ts
//
// Index Normalizer: raw crowd-sensor measurements -> dimensionless indices in [0,1].
//
// Two pure steps:
// 1) resolveRawSample: repair missing / ill-typed / out-of-range fields
//    (last-known-good, else neutral default) and record every defect.
// 2) computeIndices: fixed formulas over the resolved sample.
//
// No IO. No Date.now(): time enters only through IndexContext.referenceTs.
// The phase tag is carried along but never read by a formula.

import type {
  AuxSignalField,
  CaiBasisV1,
  CaiConfigV1,
  CdiConfigV1,
  CoreMeasurementField,
  EiConfigV1,
  EngineConfigV1,
  IndexSetV1,
  InputDefectV1,
  RawSampleInputV1,
  RawSampleV1,
  ThiConfigV1,
  TiConfigV1,
} from "@ews/contracts";
import { clamp, clamp01, isFiniteNumber } from "../util";
import type { EventCalendar, IndexContext } from "./context";

/** Physical plausibility bounds; values outside are clamped and flagged. */
export const CORE_RANGES: Readonly<Record<CoreMeasurementField, readonly [number, number]>> = {
  temp_c: [-40, 60],
  rh_pct: [0, 100],
  density_p_m2: [0, 10],
  speed_mps: [0, 10],
  ati: [0, 1],
  sni: [0, 1],
  pci: [0, 1],
};

export const AUX_RANGES: Readonly<Record<AuxSignalField, readonly [number, number]>> = {
  speed_var: [0, 5],
  push_rate: [0, 1000],
  shout_rate: [0, 1000],
  near_falls: [0, 1000],
};

/**
 * Substitutes for a core field on the first sample, when no last-known-good
 * value exists yet. Chosen to contribute nothing (or the midpoint for the
 * behavioural proxies) to the indices.
 */
export function neutralDefault(field: CoreMeasurementField, cdi: CdiConfigV1): number {
  switch (field) {
    case "temp_c":
      return 20;
    case "rh_pct":
      return 50;
    case "density_p_m2":
      return 0;
    case "speed_mps":
      return cdi.free_flow_speed_mps;
    case "ati":
    case "sni":
    case "pci":
      return 0.5;
  }
}

type FieldRead = { kind: "ok"; value: number } | { kind: "missing" } | { kind: "ill_typed" };

function readField(v: unknown): FieldRead {
  if (v === undefined || v === null) return { kind: "missing" };
  if (isFiniteNumber(v)) return { kind: "ok", value: v };
  return { kind: "ill_typed" };
}

export type ResolvedSample = {
  sample: RawSampleV1;
  defects: InputDefectV1[];
};

/**
 * Builds the immutable RawSampleV1 for one input. Never throws.
 *
 * @param ts - already-validated sample timestamp (unix ms)
 * @param previous - last resolved sample of this engine, or null on the first one
 */
export function resolveRawSample(
  input: RawSampleInputV1,
  ts: number,
  previous: RawSampleV1 | null,
  cfg: EngineConfigV1
): ResolvedSample {
  const defects: InputDefectV1[] = [];

  const core = (field: CoreMeasurementField): number => {
    const [lo, hi] = CORE_RANGES[field];
    const read = readField(input[field]);
    if (read.kind === "ok") {
      if (read.value < lo || read.value > hi) {
        const clamped = clamp(read.value, lo, hi);
        defects.push({ field, kind: "out_of_range", substituted_with: clamped });
        return clamped;
      }
      return read.value;
    }
    const fallback = previous ? previous[field] : neutralDefault(field, cfg.indices.cdi);
    defects.push({ field, kind: read.kind, substituted_with: fallback });
    return fallback;
  };

  const aux = (field: AuxSignalField): number | null => {
    const [lo, hi] = AUX_RANGES[field];
    const read = readField(input[field]);
    // Auxiliary signals are optional: absence is not a defect.
    if (read.kind === "missing") return null;
    if (read.kind === "ill_typed") {
      const fallback = previous ? previous[field] : null;
      defects.push({ field, kind: "ill_typed", substituted_with: fallback });
      return fallback;
    }
    if (read.value < lo || read.value > hi) {
      const clamped = clamp(read.value, lo, hi);
      defects.push({ field, kind: "out_of_range", substituted_with: clamped });
      return clamped;
    }
    return read.value;
  };

  const sample: RawSampleV1 = Object.freeze({
    ts,
    phase: typeof input.phase === "string" && input.phase.trim().length > 0 ? input.phase.trim() : null,
    temp_c: core("temp_c"),
    rh_pct: core("rh_pct"),
    density_p_m2: core("density_p_m2"),
    speed_mps: core("speed_mps"),
    ati: core("ati"),
    sni: core("sni"),
    pci: core("pci"),
    speed_var: aux("speed_var"),
    push_rate: aux("push_rate"),
    shout_rate: aux("shout_rate"),
    near_falls: aux("near_falls"),
  });

  return { sample, defects };
}

/* -------------------- THI -------------------- */

/**
 * Temperature-Humidity Index in Celsius-like units:
 * THI = T - (0.55 - 0.0055*RH) * (T - 14.5), RH in percent.
 */
export function thiCelsius(tempC: number, rhPct: number): number {
  return tempC - (0.55 - 0.0055 * rhPct) * (tempC - 14.5);
}

export function computeThi(tempC: number, rhPct: number, cfg: ThiConfigV1): number {
  const raw = thiCelsius(tempC, rhPct);
  return clamp01((raw - cfg.comfort_c) / (cfg.danger_c - cfg.comfort_c));
}

/* -------------------- CDI -------------------- */

/** Piecewise-linear lookup; flat beyond both ends of the curve. */
export function densityIndex(density: number, curve: ReadonlyArray<readonly [number, number]>): number {
  if (!curve.length) return 0;
  const [x0, y0] = curve[0];
  if (density <= x0) return clamp01(y0);
  for (let i = 1; i < curve.length; i++) {
    const [xa, ya] = curve[i - 1];
    const [xb, yb] = curve[i];
    if (density <= xb) {
      return clamp01(ya + (yb - ya) * ((density - xa) / (xb - xa)));
    }
  }
  return clamp01(curve[curve.length - 1][1]);
}

/** Lower speed relative to free flow -> higher value. */
export function slownessIndex(speedMps: number, freeFlowMps: number): number {
  const speed = clamp(speedMps, 0, freeFlowMps);
  return clamp01(1 - speed / freeFlowMps);
}

export function turbulenceIndex(speedVar: number, band: number): number {
  return clamp01(speedVar / band);
}

export function computeCdi(sample: RawSampleV1, cfg: CdiConfigV1): number {
  const dn = densityIndex(sample.density_p_m2, cfg.density_curve);
  const sn = slownessIndex(sample.speed_mps, cfg.free_flow_speed_mps);
  const w = cfg.weights;

  if (sample.speed_var === null) {
    // No turbulence signal: renormalise over density and slowness.
    const denom = w.density + w.slowness;
    if (denom <= 0) return 0;
    return clamp01((w.density * dn + w.slowness * sn) / denom);
  }

  const vn = turbulenceIndex(sample.speed_var, cfg.speed_var_band);
  return clamp01(w.density * dn + w.turbulence * vn + w.slowness * sn);
}

/* -------------------- CAI -------------------- */

export function computeCai(
  sample: RawSampleV1,
  previous: RawSampleV1 | null,
  cai: CaiConfigV1,
  cdi: CdiConfigV1
): { value: number; basis: CaiBasisV1 } {
  const amp = cai.density_amplification * densityIndex(sample.density_p_m2, cdi.density_curve);

  const hasSignals = sample.push_rate !== null || sample.shout_rate !== null || sample.near_falls !== null;
  if (hasSignals) {
    const s = cai.signal_scales;
    const w = cai.signal_weights;
    const base =
      w.push_rate * clamp01((sample.push_rate ?? 0) / s.push_rate) +
      w.shout_rate * clamp01((sample.shout_rate ?? 0) / s.shout_rate) +
      w.near_falls * clamp01((sample.near_falls ?? 0) / s.near_falls);
    return { value: clamp01(base + amp), basis: "signals" };
  }

  if (previous && sample.ts - previous.ts <= cai.max_gap_ms) {
    const dDensity = Math.abs(sample.density_p_m2 - previous.density_p_m2);
    const dSpeed = Math.abs(sample.speed_mps - previous.speed_mps);
    const base = 0.5 * clamp01(dDensity / cai.density_delta_band) + 0.5 * clamp01(dSpeed / cai.speed_delta_band);
    return { value: clamp01(base + amp), basis: "volatility" };
  }

  return { value: clamp01(amp), basis: "density_only" };
}

/* -------------------- TI -------------------- */

export function localHourOfDay(ts: number, utcOffsetMinutes: number): number {
  return new Date(ts + utcOffsetMinutes * 60_000).getUTCHours();
}

function hourDistance(a: number, b: number): number {
  const d = Math.abs(a - b) % 24;
  return Math.min(d, 24 - d);
}

export function computeTi(referenceTs: number, cfg: TiConfigV1): number {
  const hour = localHourOfDay(referenceTs, cfg.utc_offset_minutes);

  let score = cfg.base;
  for (const w of cfg.peak_windows) {
    if (w.start_hour <= hour && hour < w.end_hour) score += cfg.peak_bonus;
  }

  const boundaries = new Set<number>();
  for (const w of cfg.peak_windows) {
    boundaries.add(w.start_hour % 24);
    boundaries.add(w.end_hour % 24);
  }
  for (const b of boundaries) {
    if (hourDistance(hour, b) === 1) {
      score += cfg.shoulder_bonus;
      break;
    }
  }

  return clamp01(score);
}

/* -------------------- EI -------------------- */

export function computeEi(referenceTs: number, calendar: EventCalendar, cfg: EiConfigV1): number {
  if (cfg.override !== null) return clamp01(cfg.override);
  const fromCalendar = calendar.intensityAt(referenceTs);
  if (fromCalendar !== null) return clamp01(fromCalendar);
  return clamp01(cfg.baseline);
}

/* -------------------- all indices -------------------- */

export type ComputedIndices = {
  indices: IndexSetV1;
  cai_basis: CaiBasisV1;
};

export function computeIndices(
  sample: RawSampleV1,
  previous: RawSampleV1 | null,
  ctx: IndexContext,
  cfg: EngineConfigV1
): ComputedIndices {
  const { thi, cdi, cai, ti, ei } = cfg.indices;
  const caiOut = computeCai(sample, previous, cai, cdi);

  const indices: IndexSetV1 = Object.freeze({
    CAI: caiOut.value,
    CDI: computeCdi(sample, cdi),
    THI: computeThi(sample.temp_c, sample.rh_pct, thi),
    TI: computeTi(ctx.referenceTs, ti),
    EI: computeEi(ctx.referenceTs, ctx.calendar, ei),
    ATI: clamp01(sample.ati),
    SNI: clamp01(sample.sni),
    PCI: clamp01(sample.pci),
  });

  return { indices, cai_basis: caiOut.basis };
}
