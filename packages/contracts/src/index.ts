export * from "./schema/alert_level_v1";
export * from "./schema/raw_sample_v1";
export * from "./schema/index_set_v1";
export * from "./schema/risk_snapshot_v1";
export * from "./schema/engine_config_v1";
