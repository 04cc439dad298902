import { test } from "node:test";
import assert from "node:assert/strict";

import { EngineConfigV1Schema, RawSampleInputV1Schema } from "@ews/contracts";
import type { RawSampleV1 } from "@ews/contracts";
import {
  StaticEventCalendar,
  computeCai,
  computeCdi,
  computeEi,
  computeIndices,
  computeThi,
  computeTi,
  densityIndex,
  resolveRawSample,
  slownessIndex,
  thiCelsius,
} from "../index";
import { MIN, T0, approx, calmSample, testConfig } from "./fixtures";

const cfg = EngineConfigV1Schema.parse(testConfig());
const { thi, cdi, cai, ti, ei } = cfg.indices;

function sample(fields: Partial<RawSampleV1> = {}): RawSampleV1 {
  return {
    ts: T0,
    phase: null,
    temp_c: 20,
    rh_pct: 50,
    density_p_m2: 0,
    speed_mps: 1.2,
    ati: 0.5,
    sni: 0.5,
    pci: 0.5,
    speed_var: null,
    push_rate: null,
    shout_rate: null,
    near_falls: null,
    ...fields,
  };
}

function input(fields: Record<string, unknown>) {
  return RawSampleInputV1Schema.parse({ timestamp: T0, ...fields });
}

test("THI follows the Celsius heat-stress formula and comfort/danger bounds", () => {
  approx(thiCelsius(30, 50), 25.7375);
  approx(computeThi(30, 50, thi), 0.37375);
  assert.equal(computeThi(20, 50, thi), 0);
  assert.equal(computeThi(45, 90, thi), 1);
});

test("density index interpolates the Fruin-style curve and saturates past critical density", () => {
  approx(densityIndex(0.5, cdi.density_curve), 0.075);
  approx(densityIndex(1.5, cdi.density_curve), 0.275);
  approx(densityIndex(2.75, cdi.density_curve), 0.575);
  assert.equal(densityIndex(6, cdi.density_curve), 1);
  assert.equal(densityIndex(-1, cdi.density_curve), 0);
});

test("slowness index is relative to free-flow speed", () => {
  approx(slownessIndex(0.6, 1.2), 0.5);
  assert.equal(slownessIndex(2, 1.2), 0);
  assert.equal(slownessIndex(0, 1.2), 1);
});

test("CDI renormalises without a turbulence signal", () => {
  approx(computeCdi(sample({ density_p_m2: 2.75, speed_mps: 0.6 }), cdi), 0.3875 / 0.7);
  approx(computeCdi(sample({ density_p_m2: 2.75, speed_mps: 0.6, speed_var: 0.25 }), cdi), 0.5375);
});

test("low speed and high density jointly drive CDI to 1", () => {
  assert.equal(computeCdi(sample({ density_p_m2: 6, speed_mps: 0 }), cdi), 1);
  assert.equal(computeCdi(sample({ density_p_m2: 0, speed_mps: 1.2 }), cdi), 0);
});

test("CAI uses behavioural signals when present", () => {
  const out = computeCai(sample({ density_p_m2: 2, push_rate: 5, shout_rate: 10 }), null, cai, cdi);
  assert.equal(out.basis, "signals");
  approx(out.value, 0.45);
});

test("CAI falls back to short-window volatility, then to density alone", () => {
  const prev = sample({ ts: T0, density_p_m2: 1, speed_mps: 1 });
  const cur = sample({ ts: T0 + 5 * MIN, density_p_m2: 1.5, speed_mps: 0.75 });

  const vol = computeCai(cur, prev, cai, cdi);
  assert.equal(vol.basis, "volatility");
  approx(vol.value, 0.56875);

  const stale = computeCai(sample({ ts: T0 + 20 * MIN, density_p_m2: 1.5, speed_mps: 0.75 }), prev, cai, cdi);
  assert.equal(stale.basis, "density_only");
  approx(stale.value, 0.06875);

  const first = computeCai(cur, null, cai, cdi);
  assert.equal(first.basis, "density_only");
  approx(first.value, 0.06875);
});

test("TI peaks inside configured windows and bumps shoulder hours", () => {
  const at = (h: number) => Date.UTC(2028, 3, 22, h, 0, 0);
  approx(computeTi(at(13), ti), 0.1);
  approx(computeTi(at(2), ti), 0.2);
  approx(computeTi(at(8), ti), 0.6);
  approx(computeTi(at(7), ti), 0.7);
  approx(computeTi(at(5), ti), 0.7);
});

test("TI honours the configured UTC offset", () => {
  const ist = { ...ti, utc_offset_minutes: 330 };
  // 02:30 UTC is 08:00 at +05:30
  approx(computeTi(Date.UTC(2028, 3, 22, 2, 30, 0), ist), 0.6);
});

test("EI prefers override, then calendar, then baseline", () => {
  const calendar = new StaticEventCalendar([
    { name: "shahi_snan", start: "2028-04-22T00:00:00Z", end: "2028-04-22T12:00:00Z", intensity: 0.9 },
    { name: "procession", start: "2028-04-22T06:00:00Z", end: "2028-04-22T08:00:00Z", intensity: 0.7 },
  ]);
  const morning = Date.UTC(2028, 3, 22, 7, 0, 0);
  assert.equal(computeEi(morning, calendar, ei), 0.9);
  assert.equal(computeEi(T0, calendar, ei), 0.2);
  assert.equal(computeEi(T0, calendar, { ...ei, override: 0.65 }), 0.65);
});

test("resolveRawSample substitutes neutral defaults on the first sample and flags defects", () => {
  const { sample: s, defects } = resolveRawSample(input({ rh_pct: 50, density_p_m2: 1, speed_mps: 1, ati: 0.2, sni: 0.3, pci: 0.4 }), T0, null, cfg);
  assert.equal(s.temp_c, 20);
  assert.deepEqual(defects, [{ field: "temp_c", kind: "missing", substituted_with: 20 }]);
  assert.equal(s.speed_var, null);
});

test("resolveRawSample uses last-known-good values for ill-typed fields", () => {
  const prev = sample({ temp_c: 31.5, speed_var: 0.2 });
  const { sample: s, defects } = resolveRawSample(
    input({ ...calmSample(T0 + MIN), temp_c: "hot", speed_var: "n/a" }),
    T0 + MIN,
    prev,
    cfg
  );
  assert.equal(s.temp_c, 31.5);
  assert.equal(s.speed_var, 0.2);
  assert.deepEqual(defects, [
    { field: "temp_c", kind: "ill_typed", substituted_with: 31.5 },
    { field: "speed_var", kind: "ill_typed", substituted_with: 0.2 },
  ]);
});

test("resolveRawSample clamps out-of-range measurements and trims the phase tag", () => {
  const { sample: s, defects } = resolveRawSample(
    input({ ...calmSample(T0), rh_pct: 120, sni: 1.05, phase: "  festival_peak " }),
    T0,
    null,
    cfg
  );
  assert.equal(s.rh_pct, 100);
  assert.equal(s.sni, 1);
  assert.equal(s.phase, "festival_peak");
  assert.deepEqual(defects, [
    { field: "rh_pct", kind: "out_of_range", substituted_with: 100 },
    { field: "sni", kind: "out_of_range", substituted_with: 1 },
  ]);
});

test("computeIndices keeps every index in [0,1] for extreme inputs", () => {
  const extreme = sample({
    temp_c: 60,
    rh_pct: 100,
    density_p_m2: 10,
    speed_mps: 0,
    speed_var: 5,
    push_rate: 1000,
    shout_rate: 1000,
    near_falls: 1000,
    ati: 1,
    sni: 1,
    pci: 1,
  });
  const calendar = new StaticEventCalendar([]);
  const { indices } = computeIndices(extreme, null, { referenceTs: Date.UTC(2028, 3, 22, 5, 0, 0), calendar }, cfg);
  for (const [k, v] of Object.entries(indices)) {
    assert.ok(v >= 0 && v <= 1, `${k}=${v} out of [0,1]`);
  }
  assert.equal(indices.CAI, 1);
  approx(indices.CDI, 1);
  assert.equal(indices.THI, 1);
});

test("the phase tag does not influence any index", () => {
  const calendar = new StaticEventCalendar([]);
  const ctx = { referenceTs: T0, calendar };
  const a = computeIndices(sample({ phase: "normal", density_p_m2: 3 }), null, ctx, cfg);
  const b = computeIndices(sample({ phase: "emergency_situation", density_p_m2: 3 }), null, ctx, cfg);
  assert.deepEqual(a, b);
});
