// Shared fixtures for @ews/risk-engine tests.

import assert from "node:assert/strict";
import type { EngineConfigInputV1 } from "@ews/contracts";

export const T0 = Date.UTC(2028, 3, 22, 13, 0, 0); // 13:00 UTC, off-peak
export const MIN = 60_000;

export function testConfig(overrides: Partial<EngineConfigInputV1> = {}): EngineConfigInputV1 {
  return {
    schema_version: "1.0.0",
    zones: ["ghat-a", "ghat-b"],
    weights: { CAI: 0.25, CDI: 0.25, THI: 0.2, TI: 0.15, EI: 0.15 },
    behavioral_weights: { ATI: 0.3, SNI: 0.5, PCI: 0.2 },
    blend: { physical: 0.6, behavioral: 0.4 },
    alert: {
      rising: { yellow: 0.4, orange: 0.6, red: 0.75 },
      hysteresis: { mode: "fallback", fallback: { yellow: 0.35, orange: 0.55, red: 0.7 } },
    },
    history: { capacity: 288 },
    ...overrides,
  };
}

/** A calm reading: contributes nothing to THI, CDI or CAI. */
export function calmSample(ts: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    timestamp: new Date(ts).toISOString(),
    phase: "normal",
    temp_c: 20,
    rh_pct: 50,
    density_p_m2: 0,
    speed_mps: 1.2,
    ati: 0.5,
    sni: 0.5,
    pci: 0.5,
    ...extra,
  };
}

export function approx(actual: number, expected: number, eps = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= eps, `expected ${expected}, got ${actual}`);
}
