import type { EngineConfigInputV1 } from "@ews/contracts";

export const T0 = Date.UTC(2028, 3, 22, 13, 0, 0);
export const MIN = 60_000;

export function serverConfig(): EngineConfigInputV1 {
  return {
    schema_version: "1.0.0",
    zones: ["main", "gate-2"],
    weights: { CAI: 0.25, CDI: 0.25, THI: 0.2, TI: 0.15, EI: 0.15 },
    alert: {
      rising: { yellow: 0.4, orange: 0.6, red: 0.75 },
      hysteresis: { mode: "fallback", fallback: { yellow: 0.35, orange: 0.55, red: 0.7 } },
    },
  };
}

export function calm(ts: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
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
