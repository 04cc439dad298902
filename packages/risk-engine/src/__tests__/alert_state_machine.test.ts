import { test } from "node:test";
import assert from "node:assert/strict";

import type { AlertConfigV1 } from "@ews/contracts";
import { AlertStateMachine, INITIAL_ALERT_STATE, nextAlertState, rawTargetLevel } from "../index";
import { MIN, T0 } from "./fixtures";

const rising = { yellow: 0.4, orange: 0.6, red: 0.75 };
const fallbackCfg: AlertConfigV1 = {
  rising,
  hysteresis: { mode: "fallback", fallback: { yellow: 0.35, orange: 0.55, red: 0.7 } },
};
const holdCfg: AlertConfigV1 = { rising, hysteresis: { mode: "min_hold", min_hold_ms: 10 * MIN } };

test("raw target is the highest level whose rising threshold is reached", () => {
  assert.equal(rawTargetLevel(0.39, rising), "GREEN");
  assert.equal(rawTargetLevel(0.4, rising), "YELLOW");
  assert.equal(rawTargetLevel(0.6, rising), "ORANGE");
  assert.equal(rawTargetLevel(0.75, rising), "RED");
});

test("upgrades are immediate, including multi-level jumps", () => {
  const m = new AlertStateMachine(fallbackCfg);
  const s = m.step(0.8, T0);
  assert.equal(s.level, "RED");
  assert.equal(s.previous, "GREEN");
  assert.equal(s.transitioned, true);
  assert.deepEqual(m.state, { level: "RED", since_ts: T0, last_upgrade_ts: T0 });
});

test("crossing a rising threshold from below never lowers the level", () => {
  for (const [score, expected] of [
    [0.39, "GREEN"],
    [0.41, "YELLOW"],
    [0.61, "ORANGE"],
    [0.76, "RED"],
  ] as const) {
    const m = new AlertStateMachine(fallbackCfg);
    assert.equal(m.step(score, T0).level, expected);
  }
});

test("ORANGE reached at 0.62 holds at 0.58 and drops to YELLOW at 0.50", () => {
  const m = new AlertStateMachine(fallbackCfg);
  assert.equal(m.step(0.62, T0).level, "ORANGE");

  const held = m.step(0.58, T0 + MIN);
  assert.equal(held.level, "ORANGE");
  assert.equal(held.raw_target, "YELLOW");
  assert.equal(held.held, true);
  assert.equal(held.transitioned, false);

  const dropped = m.step(0.5, T0 + 2 * MIN);
  assert.equal(dropped.level, "YELLOW");
  assert.equal(dropped.held, false);
  assert.equal(dropped.transitioned, true);
});

test("a downgrade needs the score below every fall-back above the target", () => {
  const m = new AlertStateMachine(fallbackCfg);
  m.step(0.62, T0);
  // 0.38 clears ORANGE's fall-back but not YELLOW's, so the target GREEN is refused.
  const s = m.step(0.38, T0 + MIN);
  assert.equal(s.raw_target, "GREEN");
  assert.equal(s.level, "ORANGE");
  assert.equal(s.held, true);
  assert.equal(s.transitioned, false);
  assert.equal(m.step(0.3, T0 + 2 * MIN).level, "GREEN");
});

test("RED stays RED for a score between the ORANGE and RED fall-backs", () => {
  const m = new AlertStateMachine(fallbackCfg);
  m.step(0.8, T0);

  const s = m.step(0.58, T0 + MIN);
  assert.equal(s.raw_target, "YELLOW");
  assert.equal(s.level, "RED");
  assert.equal(s.held, true);
  assert.deepEqual(m.state, { level: "RED", since_ts: T0, last_upgrade_ts: T0 });

  // target ORANGE: only RED's fall-back (0.7) has to be cleared
  const down = m.step(0.65, T0 + 2 * MIN);
  assert.equal(down.level, "ORANGE");
  assert.equal(down.held, false);
  assert.deepEqual(down.state, { level: "ORANGE", since_ts: T0 + 2 * MIN, last_upgrade_ts: T0 });
});

test("a score below every fall-back drops straight to the target", () => {
  const m = new AlertStateMachine(fallbackCfg);
  m.step(0.8, T0);
  assert.equal(m.step(0.2, T0 + MIN).level, "GREEN");
});

test("a score oscillating around a rising threshold does not flicker", () => {
  const m = new AlertStateMachine(fallbackCfg);
  const levels = [0.61, 0.59, 0.61, 0.58, 0.6, 0.56].map((r, i) => m.step(r, T0 + i * MIN).level);
  assert.deepEqual(levels, ["ORANGE", "ORANGE", "ORANGE", "ORANGE", "ORANGE", "ORANGE"]);

  const y = new AlertStateMachine(fallbackCfg);
  const yl = [0.41, 0.39, 0.41, 0.36].map((r, i) => y.step(r, T0 + i * MIN).level);
  assert.deepEqual(yl, ["YELLOW", "YELLOW", "YELLOW", "YELLOW"]);
});

test("malformed scores are clamped instead of throwing", () => {
  const m = new AlertStateMachine(fallbackCfg);
  const nan = m.step(Number.NaN, T0);
  assert.equal(nan.score, 0);
  assert.equal(nan.level, "GREEN");
  const big = m.step(5, T0 + MIN);
  assert.equal(big.score, 1);
  assert.equal(big.level, "RED");
});

test("min_hold policy keeps the level until the hold elapsed since the last upgrade", () => {
  const m = new AlertStateMachine(holdCfg);
  assert.equal(m.step(0.62, T0).level, "ORANGE");

  const held = m.step(0.1, T0 + 5 * MIN);
  assert.equal(held.level, "ORANGE");
  assert.equal(held.held, true);

  const released = m.step(0.1, T0 + 10 * MIN);
  assert.equal(released.level, "GREEN");
  assert.deepEqual(m.state, { level: "GREEN", since_ts: T0 + 10 * MIN, last_upgrade_ts: T0 });
});

test("nextAlertState is pure", () => {
  const state = { level: "ORANGE" as const, since_ts: T0, last_upgrade_ts: T0 };
  const a = nextAlertState(state, 0.2, T0 + MIN, fallbackCfg);
  const b = nextAlertState(state, 0.2, T0 + MIN, fallbackCfg);
  assert.deepEqual(a, b);
  assert.deepEqual(state, { level: "ORANGE", since_ts: T0, last_upgrade_ts: T0 });
  assert.equal(INITIAL_ALERT_STATE.level, "GREEN");
});

test("evaluate does not change the machine until apply", () => {
  const m = new AlertStateMachine(fallbackCfg);
  const step = m.evaluate(0.9, T0);
  assert.equal(m.level, "GREEN");
  m.apply(step);
  assert.equal(m.level, "RED");
});
