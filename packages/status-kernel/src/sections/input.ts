// Status Kernel - input section (metrics only)

import type { MetricV1 } from "@upsmon/contracts";

import type { FieldAccessorV1 } from "../inputs/field_accessor";
import { unsignedFieldV1 } from "../inputs/field_parsers";
import { INPUT_COLUMNS_V1, UPS_OIDS_V1, inputLineOid } from "../inputs/ups_mib_oids";
import type { SectionResultV1 } from "../report/status_report";

export function evaluateInputV1(fields: FieldAccessorV1): SectionResultV1 {
  const lineBads = fields.get(UPS_OIDS_V1.inputLineBads, unsignedFieldV1, "input line bads");
  const lines = fields.get(UPS_OIDS_V1.inputNumLines, unsignedFieldV1, "input line count");

  const metrics: MetricV1[] = [{ label: "input_line_bads", value: lineBads, uom: "c" }];

  for (let line = 1; line <= lines; line++) {
    const frequency = fields.get(inputLineOid(INPUT_COLUMNS_V1.frequency, line), unsignedFieldV1, `input ${line} frequency`) / 10;
    const voltage = fields.get(inputLineOid(INPUT_COLUMNS_V1.voltage, line), unsignedFieldV1, `input ${line} voltage`) / 10;
    const current = fields.get(inputLineOid(INPUT_COLUMNS_V1.current, line), unsignedFieldV1, `input ${line} current`) / 10;
    const power = fields.get(inputLineOid(INPUT_COLUMNS_V1.truePower, line), unsignedFieldV1, `input ${line} true power`);

    metrics.push(
      { label: `input${line}_frequency`, value: frequency, uom: "Hz" },
      { label: `input${line}_voltage`, value: voltage, uom: "V" },
      { label: `input${line}_current`, value: current, uom: "A" },
      { label: `input${line}_power`, value: power, uom: "W" }
    );
  }

  return { metrics, fragments: [] };
}
