// @upsmon/probe
// UPS-MIB probe: argv, SNMP transport, orchestration and plugin output.

export * from "./cli/args";
export * from "./cli/env";
export * from "./logger";
export * from "./probe";
export * from "./output/plugin_output";
export * from "./transport/types";
export * from "./transport/fetch_plan";
export * from "./transport/snmp_values";
export * from "./transport/snmp_session";
