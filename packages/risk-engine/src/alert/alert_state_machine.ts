/**
 * File: packages/risk-engine/src/alert/alert_state_machine.ts
 *
 * Alert State Machine (hysteresis ladder).
 *
 * Levels: GREEN < YELLOW < ORANGE < RED.
 *
 * Mealy machine: next = f(state, score, ts). Never throws; malformed scores
 * are clamped to [0,1] before evaluation.
 *
 * Upgrades are immediate. Downgrades are guarded by the configured policy:
 * - fallback: move down to the raw target T only when the score is below the
 *   fall-back threshold of every level strictly above T (each fall-back is
 *   strictly lower than its rising threshold); otherwise stay at the current level.
 * - min_hold: leave the current level only once min_hold_ms elapsed since the
 *   last upgrade.
 */

import { ALERT_LEVELS, alertRank } from "@ews/contracts";
import type { AlertConfigV1, AlertLevelV1, ElevatedAlertLevelV1 } from "@ews/contracts";
import { clamp01 } from "../util";

export type AlertState = {
  level: AlertLevelV1;
  since_ts: number | null; // when the current level was entered (null = startup)
  last_upgrade_ts: number | null;
};

export const INITIAL_ALERT_STATE: Readonly<AlertState> = Object.freeze({
  level: "GREEN",
  since_ts: null,
  last_upgrade_ts: null,
});

export type AlertStep = {
  state: Readonly<AlertState>; // state after this step
  previous: AlertLevelV1;
  level: AlertLevelV1;
  raw_target: AlertLevelV1;
  score: number; // clamped input
  transitioned: boolean;
  held: boolean; // raw target was lower but the downgrade was suppressed
};

function thresholdKey(level: ElevatedAlertLevelV1): "yellow" | "orange" | "red" {
  switch (level) {
    case "YELLOW":
      return "yellow";
    case "ORANGE":
      return "orange";
    case "RED":
      return "red";
  }
}

/** Highest level whose rising threshold is <= score, GREEN if none. */
export function rawTargetLevel(score: number, rising: AlertConfigV1["rising"]): AlertLevelV1 {
  const r = clamp01(score);
  if (r >= rising.red) return "RED";
  if (r >= rising.orange) return "ORANGE";
  if (r >= rising.yellow) return "YELLOW";
  return "GREEN";
}

function downgradeTarget(state: AlertState, target: AlertLevelV1, r: number, ts: number, cfg: AlertConfigV1): AlertLevelV1 {
  const policy = cfg.hysteresis;

  if (policy.mode === "min_hold") {
    if (state.last_upgrade_ts === null) return target;
    return ts - state.last_upgrade_ts >= policy.min_hold_ms ? target : state.level;
  }

  for (const level of ALERT_LEVELS) {
    if (level === "GREEN" || alertRank(level) <= alertRank(target)) continue;
    if (alertRank(level) > alertRank(state.level)) break;
    if (r >= policy.fallback[thresholdKey(level)]) return state.level;
  }
  return target;
}

export function nextAlertState(state: Readonly<AlertState>, score: number, ts: number, cfg: AlertConfigV1): AlertStep {
  const r = clamp01(score);
  const current = state.level;
  const target = rawTargetLevel(r, cfg.rising);

  let level = current;
  let held = false;
  let nextState: Readonly<AlertState> = state;

  if (alertRank(target) > alertRank(current)) {
    level = target;
    nextState = Object.freeze({ level, since_ts: ts, last_upgrade_ts: ts });
  } else if (alertRank(target) < alertRank(current)) {
    level = downgradeTarget(state, target, r, ts, cfg);
    held = level !== target;
    if (level !== current) {
      nextState = Object.freeze({ level, since_ts: ts, last_upgrade_ts: state.last_upgrade_ts });
    }
  }

  return {
    state: nextState,
    previous: current,
    level,
    raw_target: target,
    score: r,
    transitioned: level !== current,
    held,
  };
}

/**
 * Owns exactly one AlertState. `evaluate` is side-effect free; `apply`
 * commits a step produced by `evaluate` on the same state.
 */
export class AlertStateMachine {
  private current: Readonly<AlertState>;

  constructor(
    private readonly cfg: AlertConfigV1,
    initial: Readonly<AlertState> = INITIAL_ALERT_STATE
  ) {
    this.current = initial;
  }

  get state(): Readonly<AlertState> {
    return this.current;
  }

  get level(): AlertLevelV1 {
    return this.current.level;
  }

  evaluate(score: number, ts: number): AlertStep {
    return nextAlertState(this.current, score, ts, this.cfg);
  }

  apply(step: AlertStep): void {
    this.current = step.state;
  }

  /** evaluate + apply in one call. */
  step(score: number, ts: number): AlertStep {
    const s = this.evaluate(score, ts);
    this.apply(s);
    return s;
  }
}
