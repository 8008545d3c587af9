// -w / -c lists: one range per output line, or a single range for all lines.

import { ProbeConfigError, parseThresholdRangeV1, type ThresholdRangeV1, type ThresholdSpecV1 } from "@upsmon/status-kernel";

export function parseThresholdListV1(list: string | undefined): ReadonlyArray<ThresholdRangeV1> {
  if (list === undefined) return [];
  return list.split(",").map((item) => parseThresholdRangeV1(item));
}

/**
 * Pairs warning and critical ranges element-wise.
 */
export function buildLoadThresholdsV1(
  warningList: string | undefined,
  criticalList: string | undefined
): ReadonlyArray<ThresholdSpecV1> {
  const warning = parseThresholdListV1(warningList);
  const critical = parseThresholdListV1(criticalList);

  if (warning.length > 0 && critical.length > 0 && warning.length !== critical.length) {
    throw new ProbeConfigError(
      "THRESHOLD_COUNT_MISMATCH",
      `${warning.length} warning ranges but ${critical.length} critical ranges`
    );
  }

  const count = Math.max(warning.length, critical.length);
  const specs: ThresholdSpecV1[] = [];
  for (let i = 0; i < count; i++) {
    const spec: ThresholdSpecV1 = {};
    if (warning[i]) spec.warning = warning[i];
    if (critical[i]) spec.critical = critical[i];
    specs.push(spec);
  }
  return Object.freeze(specs);
}
