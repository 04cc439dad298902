import { z } from "zod";
import { AlertLevelV1Schema } from "./alert_level_v1";
import { CaiBasisV1Schema, IndexSetV1Schema } from "./index_set_v1";
import { RawSampleV1Schema } from "./raw_sample_v1";

const Unit = z.number().finite().min(0).max(1);

export const InputDefectV1Schema = z
  .object({
    field: z.string().min(1),
    kind: z.enum(["missing", "ill_typed", "out_of_range"]),
    substituted_with: z.number().finite().nullable(),
  })
  .strict();

export type InputDefectV1 = z.infer<typeof InputDefectV1Schema>;

/**
 * RiskSnapshotV1
 * --------------
 * One per accepted sample. Frozen by the engine before it is published, and
 * owned by the history buffer afterwards.
 */
export const RiskSnapshotV1Schema = z
  .object({
    type: z.literal("risk_snapshot_v1"),
    schema_version: z.literal("1.0.0"),
    seq: z.number().int().positive(),
    zone_id: z.string().min(1),
    ts: z.number().int().finite(),
    timestamp_iso: z.string().min(1),
    phase: z.string().nullable(),

    sample: RawSampleV1Schema,
    indices: IndexSetV1Schema,
    cai_basis: CaiBasisV1Schema,

    BI: Unit,
    physical_risk: Unit,
    extended_risk: Unit,

    alert_level: AlertLevelV1Schema,
    raw_target_level: AlertLevelV1Schema,
    alert_transition: z.object({ from: AlertLevelV1Schema, to: AlertLevelV1Schema }).strict().nullable(),
    hysteresis_held: z.boolean(),

    degraded: z.boolean(),
    defects: z.array(InputDefectV1Schema),
  })
  .strict();

export type RiskSnapshotV1 = z.infer<typeof RiskSnapshotV1Schema>;
