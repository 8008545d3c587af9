// @upsmon/status-kernel
// Entry point exports for the UPS status interpretation kernel.

export * from "./kernel";
export * from "./errors";
export * from "./settings";
export * from "./inputs/ups_mib_oids";
export * from "./inputs/field_parsers";
export * from "./inputs/field_accessor";
export * from "./taxonomy/ups_mib_tables";
export * from "./thresholds/range";
export * from "./thresholds/threshold_set";
export * from "./report/duration";
export * from "./report/status_report";
export * from "./sections/battery";
export * from "./sections/input";
export * from "./sections/output";
export * from "./sections/bypass";
export * from "./sections/alarms";
export * from "./sections/self_test";
