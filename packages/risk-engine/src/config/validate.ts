// packages/risk-engine/src/config/validate.ts
//
// Engine configuration admission.
//
// Contract:
// - structural shape comes from @ews/contracts EngineConfigV1Schema (strict, defaults filled)
// - semantic rules are checked here and ALL violations are reported, not just the first
// - any violation is fatal: the engine refuses to start with an inconsistent alert ladder

import { EngineConfigV1Schema } from "@ews/contracts";
import type { EngineConfigV1 } from "@ews/contracts";
import { sha256Hex, stableStringify } from "../util";

export const WEIGHT_SUM_TOLERANCE = 1e-3;

export type ConfigValidationError = {
  code:
    | "INVALID_CONFIG_SCHEMA"
    | "WEIGHT_NEGATIVE"
    | "WEIGHTS_NOT_NORMALISED"
    | "THRESHOLDS_NOT_INCREASING"
    | "FALLBACK_NOT_BELOW_RISING"
    | "FALLBACK_NOT_INCREASING"
    | "INVALID_RANGE"
    | "INVALID_CURVE";
  path: string;
  message: string;
};

export class EngineConfigRejected extends Error {
  public readonly status: number;
  public readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "EngineConfigRejected";
    this.status = 500;
    this.errors = errors;
  }
}

function checkWeightVector(path: string, weights: Record<string, number>, errors: ConfigValidationError[]): void {
  let sum = 0;
  for (const [k, w] of Object.entries(weights)) {
    if (w < 0) {
      errors.push({ code: "WEIGHT_NEGATIVE", path: `${path}.${k}`, message: `weight must be >= 0 (got ${w})` });
    }
    sum += w;
  }
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    errors.push({
      code: "WEIGHTS_NOT_NORMALISED",
      path,
      message: `weights must sum to 1 within ${WEIGHT_SUM_TOLERANCE} (got ${sum})`,
    });
  }
}

function checkUnitRange(path: string, v: number, errors: ConfigValidationError[]): void {
  if (v < 0 || v > 1) {
    errors.push({ code: "INVALID_RANGE", path, message: `must be within [0,1] (got ${v})` });
  }
}

function checkLadder(cfg: EngineConfigV1, errors: ConfigValidationError[]): void {
  const { rising, hysteresis } = cfg.alert;
  checkUnitRange("alert.rising.yellow", rising.yellow, errors);
  checkUnitRange("alert.rising.orange", rising.orange, errors);
  checkUnitRange("alert.rising.red", rising.red, errors);
  if (!(rising.yellow < rising.orange && rising.orange < rising.red)) {
    errors.push({
      code: "THRESHOLDS_NOT_INCREASING",
      path: "alert.rising",
      message: `rising thresholds must satisfy yellow < orange < red (got ${rising.yellow}, ${rising.orange}, ${rising.red})`,
    });
  }

  if (hysteresis.mode !== "fallback") return;
  const fb = hysteresis.fallback;
  for (const level of ["yellow", "orange", "red"] as const) {
    checkUnitRange(`alert.hysteresis.fallback.${level}`, fb[level], errors);
    if (!(fb[level] < rising[level])) {
      errors.push({
        code: "FALLBACK_NOT_BELOW_RISING",
        path: `alert.hysteresis.fallback.${level}`,
        message: `fall-back ${fb[level]} must be strictly below rising ${rising[level]}`,
      });
    }
  }
  if (!(fb.yellow < fb.orange && fb.orange < fb.red)) {
    errors.push({
      code: "FALLBACK_NOT_INCREASING",
      path: "alert.hysteresis.fallback",
      message: `fall-back thresholds must satisfy yellow < orange < red (got ${fb.yellow}, ${fb.orange}, ${fb.red})`,
    });
  }
}

function checkIndexTuning(cfg: EngineConfigV1, errors: ConfigValidationError[]): void {
  const { thi, cdi, cai, ti, ei } = cfg.indices;

  if (!(thi.danger_c > thi.comfort_c)) {
    errors.push({ code: "INVALID_RANGE", path: "indices.thi", message: "danger_c must be greater than comfort_c" });
  }

  const curve = cdi.density_curve;
  for (let i = 1; i < curve.length; i++) {
    const [x0, y0] = curve[i - 1];
    const [x1, y1] = curve[i];
    if (!(x1 > x0) || y1 < y0) {
      errors.push({
        code: "INVALID_CURVE",
        path: `indices.cdi.density_curve[${i}]`,
        message: "density curve must have strictly increasing densities and non-decreasing index values",
      });
    }
  }
  checkWeightVector("indices.cdi.weights", cdi.weights, errors);
  checkWeightVector("indices.cai.signal_weights", cai.signal_weights, errors);

  ti.peak_windows.forEach((w, i) => {
    if (!(w.end_hour > w.start_hour)) {
      errors.push({ code: "INVALID_RANGE", path: `indices.ti.peak_windows[${i}]`, message: "end_hour must be after start_hour" });
    }
  });

  ei.calendar.forEach((ev, i) => {
    const start = Date.parse(ev.start);
    const end = Date.parse(ev.end);
    if (!Number.isFinite(start) || !Number.isFinite(end) || !(end > start)) {
      errors.push({
        code: "INVALID_RANGE",
        path: `indices.ei.calendar[${i}]`,
        message: "calendar event needs ISO start/end with end after start",
      });
    }
  });
}

/**
 * Runs structural parsing and every semantic rule.
 * Returns the parsed (defaults filled) config together with the violations.
 */
export function validateEngineConfig(input: unknown): { config: EngineConfigV1 | null; errors: ConfigValidationError[] } {
  const parsed = EngineConfigV1Schema.safeParse(input);
  if (!parsed.success) {
    return {
      config: null,
      errors: parsed.error.issues.map((issue) => ({
        code: "INVALID_CONFIG_SCHEMA" as const,
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
  }

  const cfg = parsed.data;
  const errors: ConfigValidationError[] = [];
  checkWeightVector("weights", cfg.weights, errors);
  checkWeightVector("behavioral_weights", cfg.behavioral_weights, errors);
  checkWeightVector("blend", cfg.blend, errors);
  checkLadder(cfg, errors);
  checkIndexTuning(cfg, errors);

  if (new Set(cfg.zones).size !== cfg.zones.length) {
    errors.push({ code: "INVALID_CONFIG_SCHEMA", path: "zones", message: "zone ids must be unique" });
  }

  return { config: cfg, errors };
}

/** Throws EngineConfigRejected unless the config is admissible. */
export function admitEngineConfig(input: unknown): EngineConfigV1 {
  const { config, errors } = validateEngineConfig(input);
  if (!config || errors.length) throw new EngineConfigRejected(errors);
  return config;
}

export function computeConfigHash(cfg: EngineConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}
