// Status Kernel - evaluation entrypoint
//
// One pure function reduces a filled value store to a verdict, a message and
// metrics. Sections run in a fixed order: battery, input, output, bypass,
// alarms, self-test. No IO happens here; the store is filled by the caller.

import type { ValueStoreV1 } from "@upsmon/contracts";

import { FieldAccessorV1 } from "./inputs/field_accessor";
import { textFieldV1, timeTicksFieldV1, unsignedFieldV1 } from "./inputs/field_parsers";
import { UPS_OIDS_V1, type LineCountsV1 } from "./inputs/ups_mib_oids";
import { aggregateSectionsV1, type StatusEvaluationV1 } from "./report/status_report";
import { evaluateAlarmsV1 } from "./sections/alarms";
import { evaluateBatteryV1 } from "./sections/battery";
import { evaluateBypassV1 } from "./sections/bypass";
import { evaluateInputV1 } from "./sections/input";
import { evaluateOutputV1 } from "./sections/output";
import { evaluateSelfTestV1 } from "./sections/self_test";
import type { SectionContextV1, StatusKernelSettingsV1 } from "./settings";

export const DEVICE_HEAD_PLACEHOLDER = "UPS";

/**
 * Evaluates one UPS snapshot.
 *
 * @param store - Values from both fetch rounds.
 * @param settings - Ignore set, load thresholds and test-result reporting.
 * @throws ProbeDataError when a mandatory field is absent or malformed.
 * @throws ProbeConfigError when the load thresholds do not fit the output line count.
 */
export function evaluateUpsStatusV1(store: ValueStoreV1, settings: StatusKernelSettingsV1): StatusEvaluationV1 {
  const fields = new FieldAccessorV1(store);
  const ctx: SectionContextV1 = {
    settings,
    uptime: fields.get(UPS_OIDS_V1.sysUpTime, timeTicksFieldV1, "system uptime")
  };

  // Order matters only for fragment order within each severity group.
  const sections = [
    evaluateBatteryV1(fields),
    evaluateInputV1(fields),
    evaluateOutputV1(fields, ctx),
    evaluateBypassV1(fields),
    evaluateAlarmsV1(fields, ctx),
    evaluateSelfTestV1(fields, ctx)
  ];

  return aggregateSectionsV1(readDeviceHeadV1(fields), sections);
}

/**
 * "<manufacturer> <model>", either part optional, or the placeholder.
 */
export function readDeviceHeadV1(fields: FieldAccessorV1): string {
  const parts = [
    fields.optional(UPS_OIDS_V1.identManufacturer, textFieldV1, "manufacturer"),
    fields.optional(UPS_OIDS_V1.identModel, textFieldV1, "model")
  ].filter((p): p is string => typeof p === "string" && p.length > 0);

  return parts.length ? parts.join(" ") : DEVICE_HEAD_PLACEHOLDER;
}

/**
 * Counts that size the second fetch round. Missing or malformed counts are fatal.
 */
export function readLineCountsV1(store: ValueStoreV1): LineCountsV1 {
  const fields = new FieldAccessorV1(store);
  return {
    input: fields.get(UPS_OIDS_V1.inputNumLines, unsignedFieldV1, "input line count"),
    output: fields.get(UPS_OIDS_V1.outputNumLines, unsignedFieldV1, "output line count"),
    bypass: fields.get(UPS_OIDS_V1.bypassNumLines, unsignedFieldV1, "bypass line count"),
    alarms: fields.get(UPS_OIDS_V1.alarmsPresent, unsignedFieldV1, "alarms present")
  };
}
