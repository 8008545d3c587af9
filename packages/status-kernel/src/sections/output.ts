// Status Kernel - output section
//
// Per-line load is checked against the configured thresholds; the output
// source decides the section verdict (anything but "normal" is CRITICAL).

import type { MetricV1 } from "@upsmon/contracts";

import { ProbeConfigError } from "../errors";
import type { FieldAccessorV1 } from "../inputs/field_accessor";
import { codeFieldV1, rangeFieldV1, unsignedFieldV1 } from "../inputs/field_parsers";
import { OUTPUT_COLUMNS_V1, UPS_OIDS_V1, outputLineOid } from "../inputs/ups_mib_oids";
import { fragment, type ReportFragmentV1, type SectionResultV1 } from "../report/status_report";
import type { SectionContextV1 } from "../settings";
import { labelForCode, OUTPUT_SOURCE_NORMAL, OUTPUT_SOURCE_V1 } from "../taxonomy/ups_mib_tables";
import {
  classifyThresholdV1,
  describeThresholdV1,
  isThresholdCountValidV1,
  resolveThresholdForLineV1
} from "../thresholds/threshold_set";

export function evaluateOutputV1(fields: FieldAccessorV1, ctx: SectionContextV1): SectionResultV1 {
  const frequency = fields.get(UPS_OIDS_V1.outputFrequency, unsignedFieldV1, "output frequency") / 10;
  const source = fields.get(UPS_OIDS_V1.outputSource, codeFieldV1(OUTPUT_SOURCE_V1), "output source");
  const lines = fields.get(UPS_OIDS_V1.outputNumLines, unsignedFieldV1, "output line count");

  const thresholds = ctx.settings.loadThresholds;
  if (!isThresholdCountValidV1(thresholds.length, lines)) {
    throw new ProbeConfigError(
      "THRESHOLD_COUNT_MISMATCH",
      `${thresholds.length} load thresholds for ${lines} output lines (expected 1 or ${lines})`
    );
  }

  const metrics: MetricV1[] = [{ label: "output_frequency", value: frequency, uom: "Hz" }];
  const fragments: ReportFragmentV1[] = [];
  let maxLoad = 0;

  for (let line = 1; line <= lines; line++) {
    const voltage = fields.get(outputLineOid(OUTPUT_COLUMNS_V1.voltage, line), unsignedFieldV1, `output ${line} voltage`) / 10;
    const current = fields.get(outputLineOid(OUTPUT_COLUMNS_V1.current, line), unsignedFieldV1, `output ${line} current`) / 10;
    const power = fields.get(outputLineOid(OUTPUT_COLUMNS_V1.power, line), unsignedFieldV1, `output ${line} power`);
    const load = fields.get(outputLineOid(OUTPUT_COLUMNS_V1.percentLoad, line), rangeFieldV1(0, 200), `output ${line} percent load`);
    maxLoad = Math.max(maxLoad, load);

    const loadMetric: MetricV1 = { label: `output${line}_load`, value: load, uom: "%", min: 0, max: 100 };
    const spec = resolveThresholdForLineV1(thresholds, line);
    if (spec) {
      loadMetric.threshold = describeThresholdV1(spec);
      const severity = classifyThresholdV1(load, spec);
      if (severity !== "OK") {
        fragments.push(fragment(severity, `output line ${line} load ${load}%`));
      }
    }

    metrics.push(
      { label: `output${line}_voltage`, value: voltage, uom: "V" },
      { label: `output${line}_current`, value: current, uom: "A" },
      { label: `output${line}_power`, value: power, uom: "W" },
      loadMetric
    );
  }

  const text = `output ${labelForCode(OUTPUT_SOURCE_V1, source)}` + (lines > 0 ? ` (max load ${maxLoad}%)` : "");
  fragments.push(fragment(source === OUTPUT_SOURCE_NORMAL ? "OK" : "CRITICAL", text));

  return { metrics, fragments };
}
