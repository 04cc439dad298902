// @ews/risk-engine
// Entry point exports for the crowd risk-scoring and alert-state engine.

export * from "./engine";
export * from "./config/validate";
export * from "./indices/context";
export * from "./indices/normalizer";
export * from "./risk/composite";
export * from "./alert/alert_state_machine";
export * from "./history/ring_buffer";
export { clamp01, stableStringify, sha256Hex, toIso } from "./util";
