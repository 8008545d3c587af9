// Status Kernel - bypass section (metrics only, mirrors input)

import type { MetricV1 } from "@upsmon/contracts";

import type { FieldAccessorV1 } from "../inputs/field_accessor";
import { unsignedFieldV1 } from "../inputs/field_parsers";
import { BYPASS_COLUMNS_V1, UPS_OIDS_V1, bypassLineOid } from "../inputs/ups_mib_oids";
import type { SectionResultV1 } from "../report/status_report";

export function evaluateBypassV1(fields: FieldAccessorV1): SectionResultV1 {
  const frequency = fields.get(UPS_OIDS_V1.bypassFrequency, unsignedFieldV1, "bypass frequency") / 10;
  const lines = fields.get(UPS_OIDS_V1.bypassNumLines, unsignedFieldV1, "bypass line count");

  const metrics: MetricV1[] = [{ label: "bypass_frequency", value: frequency, uom: "Hz" }];

  for (let line = 1; line <= lines; line++) {
    const voltage = fields.get(bypassLineOid(BYPASS_COLUMNS_V1.voltage, line), unsignedFieldV1, `bypass ${line} voltage`) / 10;
    const current = fields.get(bypassLineOid(BYPASS_COLUMNS_V1.current, line), unsignedFieldV1, `bypass ${line} current`) / 10;
    const power = fields.get(bypassLineOid(BYPASS_COLUMNS_V1.power, line), unsignedFieldV1, `bypass ${line} power`);

    metrics.push(
      { label: `bypass${line}_voltage`, value: voltage, uom: "V" },
      { label: `bypass${line}_current`, value: current, uom: "A" },
      { label: `bypass${line}_power`, value: power, uom: "W" }
    );
  }

  return { metrics, fragments: [] };
}
