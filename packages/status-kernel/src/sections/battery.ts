// Status Kernel - battery section
//
// Battery health is never a warning: normal status reports OK, anything else CRITICAL.

import type { MetricV1 } from "@upsmon/contracts";

import type { FieldAccessorV1 } from "../inputs/field_accessor";
import { codeFieldV1, integerFieldV1, rangeFieldV1, unsignedFieldV1 } from "../inputs/field_parsers";
import { UPS_OIDS_V1 } from "../inputs/ups_mib_oids";
import { fragment, type SectionResultV1 } from "../report/status_report";
import { BATTERY_STATUS_NORMAL, BATTERY_STATUS_V1, labelForCode } from "../taxonomy/ups_mib_tables";

export function evaluateBatteryV1(fields: FieldAccessorV1): SectionResultV1 {
  const status = fields.get(UPS_OIDS_V1.batteryStatus, codeFieldV1(BATTERY_STATUS_V1), "battery status");
  const secondsOnBattery = fields.get(UPS_OIDS_V1.secondsOnBattery, unsignedFieldV1, "seconds on battery");
  const minutesRemaining = fields.get(UPS_OIDS_V1.estimatedMinutesRemaining, unsignedFieldV1, "estimated minutes remaining");
  const charge = fields.get(UPS_OIDS_V1.estimatedChargeRemaining, rangeFieldV1(0, 100), "estimated charge remaining");
  const voltage = fields.get(UPS_OIDS_V1.batteryVoltage, unsignedFieldV1, "battery voltage") / 10;
  const current = fields.get(UPS_OIDS_V1.batteryCurrent, integerFieldV1, "battery current") / 10;
  const temperature = fields.get(UPS_OIDS_V1.batteryTemperature, integerFieldV1, "battery temperature");

  const metrics: MetricV1[] = [
    { label: "battery_seconds_on", value: secondsOnBattery, uom: "s" },
    { label: "battery_minutes_remaining", value: minutesRemaining, uom: "" },
    { label: "battery_charge", value: charge, uom: "%", min: 0, max: 100 },
    { label: "battery_voltage", value: voltage, uom: "V" },
    { label: "battery_current", value: current, uom: "A" },
    { label: "battery_temperature", value: temperature, uom: "C" }
  ];

  const text = `battery ${labelForCode(BATTERY_STATUS_V1, status)} (${charge}%; ${minutesRemaining}min)`;
  return {
    metrics,
    fragments: [fragment(status === BATTERY_STATUS_NORMAL ? "OK" : "CRITICAL", text)]
  };
}
