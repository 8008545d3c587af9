// Status Kernel - warning/critical threshold pairs

import type { EvaluatedSeverityV1, MetricThresholdV1 } from "@upsmon/contracts";

import { rangeAlertsV1, type ThresholdRangeV1 } from "./range";

/**
 * One warning/critical pair. Either side may be absent.
 */
export interface ThresholdSpecV1 {
  warning?: ThresholdRangeV1;
  critical?: ThresholdRangeV1;
}

export function classifyThresholdV1(value: number, spec: ThresholdSpecV1): EvaluatedSeverityV1 {
  if (spec.critical && rangeAlertsV1(spec.critical, value)) return "CRITICAL";
  if (spec.warning && rangeAlertsV1(spec.warning, value)) return "WARNING";
  return "OK";
}

/**
 * Spec applicable to a 1-based line: the single spec for every line, or the line's own.
 * Callers validate the count first (isThresholdCountValidV1).
 */
export function resolveThresholdForLineV1(
  specs: ReadonlyArray<ThresholdSpecV1>,
  line: number
): ThresholdSpecV1 | undefined {
  if (specs.length === 0) return undefined;
  if (specs.length === 1) return specs[0];
  return specs[line - 1];
}

/**
 * Spec count must be 0, 1, or exactly the number of lines.
 */
export function isThresholdCountValidV1(specCount: number, lineCount: number): boolean {
  return specCount === 0 || specCount === 1 || specCount === lineCount;
}

/**
 * Threshold descriptor carried on a metric for the reporting sink.
 */
export function describeThresholdV1(spec: ThresholdSpecV1): MetricThresholdV1 {
  const out: MetricThresholdV1 = {};
  if (spec.warning) out.warning = spec.warning.text;
  if (spec.critical) out.critical = spec.critical.text;
  return out;
}
