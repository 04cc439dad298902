// packages/risk-engine/src/engine.ts
//
// Snapshot Orchestrator.
//
// One RiskEngine = one zone = one AlertState + one history buffer.
// ingest() computes everything into locals first; the commit block at the end
// (alert state, last-known-good, history append, latest pointer) runs
// synchronously after the frozen snapshot exists, so a reader observes either
// the previous snapshot or the new one, never a mix.

import { RawSampleInputV1Schema, parseSampleTimestamp } from "@ews/contracts";
import type { EngineConfigInputV1, EngineConfigV1, RawSampleV1, RiskSnapshotV1 } from "@ews/contracts";

import { AlertStateMachine } from "./alert/alert_state_machine";
import type { AlertState } from "./alert/alert_state_machine";
import { admitEngineConfig } from "./config/validate";
import { RingBuffer } from "./history/ring_buffer";
import { calendarFromConfig, wallClock } from "./indices/context";
import type { Clock, EventCalendar } from "./indices/context";
import { computeIndices, resolveRawSample } from "./indices/normalizer";
import { computeCompositeRisk } from "./risk/composite";
import type { RiskWeights } from "./risk/composite";
import { toIso } from "./util";

export type IngestRejectCode = "INVALID_SAMPLE" | "OUT_OF_ORDER" | "DUPLICATE_TIMESTAMP";

export type IngestOutcome =
  | { status: "ok"; snapshot: RiskSnapshotV1 }
  | { status: "degraded"; snapshot: RiskSnapshotV1 }
  | { status: "rejected"; code: IngestRejectCode; message: string };

export type RiskEngineOptions = {
  zoneId?: string; // defaults to the first configured zone
  clock?: Clock; // reference time for TI / EI, defaults to the wall clock
  calendar?: EventCalendar; // defaults to indices.ei.calendar
};

export type EngineStats = {
  accepted: number; // ok + degraded
  degraded: number;
  rejected: number;
  last_ts: number | null;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export class RiskEngine {
  readonly zoneId: string;
  readonly config: EngineConfigV1;

  private readonly clock: Clock;
  private readonly calendar: EventCalendar;
  private readonly weights: RiskWeights;
  private readonly machine: AlertStateMachine;
  private readonly buffer: RingBuffer<RiskSnapshotV1>;

  private lastGood: RawSampleV1 | null = null;
  private lastTs: number | null = null;
  private published: RiskSnapshotV1 | null = null;
  private seq = 0;
  private counters = { accepted: 0, degraded: 0, rejected: 0 };

  /** @throws EngineConfigRejected when the configuration is not admissible */
  constructor(config: EngineConfigInputV1, options: RiskEngineOptions = {}) {
    this.config = admitEngineConfig(config);
    this.zoneId = options.zoneId ?? this.config.zones[0];
    this.clock = options.clock ?? wallClock;
    this.calendar = options.calendar ?? calendarFromConfig(this.config.indices.ei);
    this.weights = {
      physical: this.config.weights,
      behavioral: this.config.behavioral_weights,
      blend: this.config.blend,
    };
    this.machine = new AlertStateMachine(this.config.alert);
    this.buffer = new RingBuffer<RiskSnapshotV1>(this.config.history.capacity);
  }

  ingest(input: unknown): IngestOutcome {
    const parsed = RawSampleInputV1Schema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      return this.reject("INVALID_SAMPLE", detail);
    }

    const ts = parseSampleTimestamp(parsed.data.timestamp);
    if (ts === null) {
      return this.reject("INVALID_SAMPLE", `unparsable timestamp: ${String(parsed.data.timestamp)}`);
    }
    if (this.lastTs !== null && ts < this.lastTs) {
      return this.reject("OUT_OF_ORDER", `sample ${toIso(ts)} is older than last accepted ${toIso(this.lastTs)}`);
    }
    if (this.lastTs !== null && ts === this.lastTs) {
      return this.reject("DUPLICATE_TIMESTAMP", `sample ${toIso(ts)} repeats the last accepted timestamp`);
    }

    const previous = this.lastGood;
    const { sample, defects } = resolveRawSample(parsed.data, ts, previous, this.config);
    const { indices, cai_basis } = computeIndices(
      sample,
      previous,
      { referenceTs: this.clock(ts), calendar: this.calendar },
      this.config
    );
    const risk = computeCompositeRisk(indices, this.weights);
    const step = this.machine.evaluate(risk.extended_risk, ts);

    const snapshot = deepFreeze<RiskSnapshotV1>({
      type: "risk_snapshot_v1",
      schema_version: "1.0.0",
      seq: this.seq + 1,
      zone_id: this.zoneId,
      ts,
      timestamp_iso: toIso(ts),
      phase: sample.phase,
      sample,
      indices,
      cai_basis,
      BI: risk.BI,
      physical_risk: risk.physical_risk,
      extended_risk: risk.extended_risk,
      alert_level: step.level,
      raw_target_level: step.raw_target,
      alert_transition: step.transitioned ? { from: step.previous, to: step.level } : null,
      hysteresis_held: step.held,
      degraded: defects.length > 0,
      defects,
    });

    // commit
    this.machine.apply(step);
    this.lastGood = sample;
    this.lastTs = ts;
    this.seq = snapshot.seq;
    this.buffer.push(snapshot);
    this.published = snapshot;
    this.counters.accepted++;
    if (snapshot.degraded) this.counters.degraded++;

    return snapshot.degraded ? { status: "degraded", snapshot } : { status: "ok", snapshot };
  }

  /** Most recent snapshot, or null before the first accepted sample. */
  latest(): RiskSnapshotV1 | null {
    return this.published;
  }

  /** Up to k most recent snapshots, oldest first. */
  history(k: number): RiskSnapshotV1[] {
    return this.buffer.last(k);
  }

  alertState(): Readonly<AlertState> {
    return this.machine.state;
  }

  stats(): EngineStats {
    return { ...this.counters, last_ts: this.lastTs };
  }

  private reject(code: IngestRejectCode, message: string): IngestOutcome {
    this.counters.rejected++;
    return { status: "rejected", code, message };
  }
}

export function createRiskEngine(config: EngineConfigInputV1, options: RiskEngineOptions = {}): RiskEngine {
  return new RiskEngine(config, options);
}
