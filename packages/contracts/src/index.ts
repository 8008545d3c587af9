// @upsmon/contracts
// Shared schemas for the probe workspaces.

export * from "./schema/raw_value_v1";
export * from "./schema/severity_v1";
export * from "./schema/metric_v1";
export * from "./schema/probe_verdict_v1";
