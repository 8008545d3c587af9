// Status Kernel - evaluation settings

import type { ThresholdSpecV1 } from "./thresholds/threshold_set";

export interface StatusKernelSettingsV1 {
  // Alarm identifiers (dotted, no leading dot) that must not raise the verdict.
  ignoredAlarmOids: ReadonlySet<string>;

  // Output-load thresholds: none, one for every line, or one per output line.
  loadThresholds: ReadonlyArray<ThresholdSpecV1>;

  // When false, finished tests with a warning/error/aborted result report nothing.
  reportTestResults: boolean;
}

export const DEFAULT_KERNEL_SETTINGS_V1: StatusKernelSettingsV1 = Object.freeze({
  ignoredAlarmOids: new Set<string>(),
  loadThresholds: Object.freeze([]),
  reportTestResults: true
});

/**
 * Values shared by the sections of one evaluation pass.
 */
export interface SectionContextV1 {
  settings: StatusKernelSettingsV1;
  // sysUpTime in TimeTicks; reference point for alarm and test durations.
  uptime: number;
}
