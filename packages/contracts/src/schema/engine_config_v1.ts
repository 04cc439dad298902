// packages/contracts/src/schema/engine_config_v1.ts
//
// Structural schema of the engine configuration (config/ews/default.json).
// Semantic rules (weights normalised, thresholds ordered, fall-backs below
// rising thresholds) are enforced by @ews/risk-engine validateEngineConfig.
// Index-tuning blocks carry their documented defaults so a config file only
// has to state the weighting scheme and the alert ladder.

import { z } from "zod";

const Num = z.number().finite();
const Unit = Num.min(0).max(1);

export const PhysicalWeightsV1Schema = z
  .object({ CAI: Num, CDI: Num, THI: Num, TI: Num, EI: Num })
  .strict();

export const BehavioralWeightsV1Schema = z
  .object({ ATI: Num.default(0.3), SNI: Num.default(0.5), PCI: Num.default(0.2) })
  .strict();

export const BlendV1Schema = z
  .object({ physical: Num.default(0.6), behavioral: Num.default(0.4) })
  .strict();

const LevelThresholdsV1Schema = z.object({ yellow: Num, orange: Num, red: Num }).strict();

export const HysteresisV1Schema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("fallback"), fallback: LevelThresholdsV1Schema }).strict(),
  z.object({ mode: z.literal("min_hold"), min_hold_ms: z.number().int().nonnegative() }).strict(),
]);

export const AlertConfigV1Schema = z
  .object({
    rising: LevelThresholdsV1Schema,
    hysteresis: HysteresisV1Schema,
  })
  .strict();

export const ThiConfigV1Schema = z
  .object({
    comfort_c: Num.default(22),
    danger_c: Num.default(32),
  })
  .strict();

export const CdiConfigV1Schema = z
  .object({
    free_flow_speed_mps: Num.positive().default(1.2),
    speed_var_band: Num.positive().default(0.5),
    // [density p/m², index] points; the last point marks the critical density.
    density_curve: z
      .array(z.tuple([Num, Unit]))
      .min(2)
      .default([
        [0, 0],
        [1, 0.15],
        [2, 0.4],
        [3.5, 0.75],
        [5, 1],
      ]),
    weights: z
      .object({ density: Num.default(0.5), turbulence: Num.default(0.3), slowness: Num.default(0.2) })
      .strict()
      .default({}),
  })
  .strict();

export const CaiConfigV1Schema = z
  .object({
    density_amplification: Unit.default(0.25),
    signal_scales: z
      .object({ push_rate: Num.positive().default(10), shout_rate: Num.positive().default(20), near_falls: Num.positive().default(10) })
      .strict()
      .default({}),
    signal_weights: z
      .object({ push_rate: Num.default(0.4), shout_rate: Num.default(0.3), near_falls: Num.default(0.3) })
      .strict()
      .default({}),
    max_gap_ms: z.number().int().positive().default(15 * 60 * 1000),
    density_delta_band: Num.positive().default(1),
    speed_delta_band: Num.positive().default(0.5),
  })
  .strict();

export const PeakWindowV1Schema = z
  .object({
    name: z.string().min(1),
    start_hour: z.number().int().min(0).max(23),
    end_hour: z.number().int().min(1).max(24), // exclusive
  })
  .strict();

export const TiConfigV1Schema = z
  .object({
    utc_offset_minutes: z.number().int().min(-14 * 60).max(14 * 60).default(0),
    base: Unit.default(0.1),
    peak_bonus: Unit.default(0.5),
    shoulder_bonus: Unit.default(0.1),
    peak_windows: z.array(PeakWindowV1Schema).default([
      { name: "pre_dawn", start_hour: 3, end_hour: 6 },
      { name: "morning", start_hour: 6, end_hour: 10 },
      { name: "evening", start_hour: 17, end_hour: 20 },
    ]),
  })
  .strict();

export const CalendarEventV1Schema = z
  .object({
    name: z.string().min(1),
    start: z.string().min(1), // ISO-8601, inclusive
    end: z.string().min(1), // ISO-8601, exclusive
    intensity: Unit,
  })
  .strict();

export const EiConfigV1Schema = z
  .object({
    baseline: Unit.default(0.2),
    override: Unit.nullable().default(null),
    calendar: z.array(CalendarEventV1Schema).default([]),
  })
  .strict();

export const EngineConfigV1Schema = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    zones: z.array(z.string().regex(/^[A-Za-z0-9_-]+$/)).min(1).default(["main"]),
    weights: PhysicalWeightsV1Schema,
    behavioral_weights: BehavioralWeightsV1Schema.default({}),
    blend: BlendV1Schema.default({}),
    alert: AlertConfigV1Schema,
    history: z
      .object({ capacity: z.number().int().positive().default(288) })
      .strict()
      .default({}),
    indices: z
      .object({
        thi: ThiConfigV1Schema.default({}),
        cdi: CdiConfigV1Schema.default({}),
        cai: CaiConfigV1Schema.default({}),
        ti: TiConfigV1Schema.default({}),
        ei: EiConfigV1Schema.default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type EngineConfigV1 = z.infer<typeof EngineConfigV1Schema>;
export type EngineConfigInputV1 = z.input<typeof EngineConfigV1Schema>;
export type PhysicalWeightsV1 = z.infer<typeof PhysicalWeightsV1Schema>;
export type BehavioralWeightsV1 = z.infer<typeof BehavioralWeightsV1Schema>;
export type BlendV1 = z.infer<typeof BlendV1Schema>;
export type HysteresisV1 = z.infer<typeof HysteresisV1Schema>;
export type AlertConfigV1 = z.infer<typeof AlertConfigV1Schema>;
export type ThiConfigV1 = z.infer<typeof ThiConfigV1Schema>;
export type CdiConfigV1 = z.infer<typeof CdiConfigV1Schema>;
export type CaiConfigV1 = z.infer<typeof CaiConfigV1Schema>;
export type TiConfigV1 = z.infer<typeof TiConfigV1Schema>;
export type EiConfigV1 = z.infer<typeof EiConfigV1Schema>;
export type CalendarEventV1 = z.infer<typeof CalendarEventV1Schema>;
