import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { EngineConfigRejected, RiskEngine, admitEngineConfig, computeConfigHash, validateEngineConfig } from "../index";
import { testConfig } from "./fixtures";

function codes(input: unknown): string[] {
  return validateEngineConfig(input).errors.map((e) => e.code);
}

test("the shipped default config is admissible", () => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(here, "../../../../config/ews/default.json"), "utf8"));
  const { errors } = validateEngineConfig(raw);
  assert.deepEqual(errors, []);
});

test("a consistent config passes with no errors", () => {
  assert.deepEqual(codes(testConfig()), []);
});

test("weights that do not sum to 1 are rejected", () => {
  assert.deepEqual(codes(testConfig({ weights: { CAI: 0.2, CDI: 0.2, THI: 0.2, TI: 0.15, EI: 0.15 } })), [
    "WEIGHTS_NOT_NORMALISED",
  ]);
  assert.deepEqual(codes(testConfig({ behavioral_weights: { ATI: 0.3, SNI: 0.5, PCI: 0.3 } })), ["WEIGHTS_NOT_NORMALISED"]);
  assert.deepEqual(codes(testConfig({ blend: { physical: 0.7, behavioral: 0.4 } })), ["WEIGHTS_NOT_NORMALISED"]);
});

test("a sum within the tolerance is accepted", () => {
  assert.deepEqual(codes(testConfig({ weights: { CAI: 0.18841, CDI: 0.22613, THI: 0.12954, TI: 0.2153, EI: 0.24063 } })), []);
});

test("negative weights are rejected even when the vector sums to 1", () => {
  assert.deepEqual(codes(testConfig({ weights: { CAI: -0.1, CDI: 0.35, THI: 0.25, TI: 0.25, EI: 0.25 } })), ["WEIGHT_NEGATIVE"]);
});

test("rising thresholds must be strictly increasing", () => {
  const cfg = testConfig({
    alert: {
      rising: { yellow: 0.6, orange: 0.6, red: 0.75 },
      hysteresis: { mode: "fallback", fallback: { yellow: 0.35, orange: 0.55, red: 0.7 } },
    },
  });
  assert.deepEqual(codes(cfg), ["THRESHOLDS_NOT_INCREASING"]);
});

test("fall-back thresholds must sit strictly below their rising thresholds", () => {
  const cfg = testConfig({
    alert: {
      rising: { yellow: 0.4, orange: 0.6, red: 0.75 },
      hysteresis: { mode: "fallback", fallback: { yellow: 0.4, orange: 0.55, red: 0.7 } },
    },
  });
  assert.deepEqual(codes(cfg), ["FALLBACK_NOT_BELOW_RISING"]);
});

test("structural problems are reported as schema errors", () => {
  const { config, errors } = validateEngineConfig({ schema_version: "1.0.0" });
  assert.equal(config, null);
  assert.ok(errors.length > 0);
  assert.ok(errors.every((e) => e.code === "INVALID_CONFIG_SCHEMA"));
  assert.ok(errors.some((e) => e.path === "weights"));
});

test("the engine refuses to initialise with an inconsistent ladder", () => {
  const cfg = testConfig({
    alert: { rising: { yellow: 0.7, orange: 0.6, red: 0.75 }, hysteresis: { mode: "min_hold", min_hold_ms: 0 } },
  });
  assert.throws(
    () => new RiskEngine(cfg),
    (err: unknown) => err instanceof EngineConfigRejected && err.errors[0]?.code === "THRESHOLDS_NOT_INCREASING"
  );
});

test("config hash ignores key order", () => {
  const a = admitEngineConfig(testConfig());
  const b = admitEngineConfig(JSON.parse(JSON.stringify(testConfig())));
  assert.equal(computeConfigHash(a), computeConfigHash(b));
  assert.match(computeConfigHash(a), /^sha256:[0-9a-f]{64}$/);
});
