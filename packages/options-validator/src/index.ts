// @upsmon/options-validator
// Command-line option admission: raw option text in, typed probe settings out.

export * from "./options/probe_settings_types";
export * from "./options/probe_options_zod";
export * from "./options/probe_options_validator";
export * from "./options/alarm_ignore";
export * from "./options/load_thresholds";
