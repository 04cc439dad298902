import type { AlertLevelV1, RiskSnapshotV1 } from "@ews/contracts";

/** Flat dashboard record for one snapshot. */
export type StatusViewV1 = {
  zone: string;
  seq: number;
  timestamp: string;
  phase: string | null;
  CAI: number;
  CDI: number;
  THI: number;
  TI: number;
  EI: number;
  ATI: number;
  SNI: number;
  PCI: number;
  BI: number;
  physical_risk: number;
  Risk: number;
  Alert: AlertLevelV1;
  hysteresis_held: boolean;
  degraded: boolean;
};

export function toStatusView(s: RiskSnapshotV1): StatusViewV1 {
  return {
    zone: s.zone_id,
    seq: s.seq,
    timestamp: s.timestamp_iso,
    phase: s.phase,
    ...s.indices,
    BI: s.BI,
    physical_risk: s.physical_risk,
    Risk: s.extended_risk,
    Alert: s.alert_level,
    hysteresis_held: s.hysteresis_held,
    degraded: s.degraded,
  };
}
