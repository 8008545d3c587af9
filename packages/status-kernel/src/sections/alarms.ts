// Status Kernel - alarm section
//
// Alarms not in the ignore set raise CRITICAL. In the listing, consecutive
// alarms raised at the same time show their elapsed time once, on the last
// member of the run.

import type { MetricV1 } from "@upsmon/contracts";

import type { FieldAccessorV1 } from "../inputs/field_accessor";
import { oidFieldV1, timeTicksFieldV1, unsignedFieldV1 } from "../inputs/field_parsers";
import { ALARM_COLUMNS_V1, UPS_OIDS_V1, alarmEntryOid } from "../inputs/ups_mib_oids";
import { elapsedTicksV1, formatTimeTicksDurationV1 } from "../report/duration";
import { fragment, type ReportFragmentV1, type SectionResultV1 } from "../report/status_report";
import type { SectionContextV1 } from "../settings";
import { alarmNameV1 } from "../taxonomy/ups_mib_tables";

export interface AlarmEntryV1 {
  oid: string;
  name: string;
  // upsAlarmTime, in TimeTicks since agent start.
  time: number;
  ignored: boolean;
}

export function readAlarmEntriesV1(fields: FieldAccessorV1, ctx: SectionContextV1): AlarmEntryV1[] {
  const present = fields.get(UPS_OIDS_V1.alarmsPresent, unsignedFieldV1, "alarms present");
  const entries: AlarmEntryV1[] = [];

  for (let row = 1; row <= present; row++) {
    const oid = fields.get(alarmEntryOid(ALARM_COLUMNS_V1.descr, row), oidFieldV1, `alarm ${row} identifier`);
    const time = fields.get(alarmEntryOid(ALARM_COLUMNS_V1.time, row), timeTicksFieldV1, `alarm ${row} time`);
    entries.push({ oid, name: alarmNameV1(oid), time, ignored: ctx.settings.ignoredAlarmOids.has(oid) });
  }

  return entries;
}

/**
 * Names for display; a name gets "(<elapsed>)" when it closes a run of equal activation times.
 */
export function renderAlarmNamesV1(alarms: ReadonlyArray<AlarmEntryV1>, uptime: number): string[] {
  return alarms.map((alarm, i) => {
    const next = alarms[i + 1];
    if (next !== undefined && next.time === alarm.time) return alarm.name;
    return `${alarm.name}(${formatTimeTicksDurationV1(elapsedTicksV1(uptime, alarm.time))})`;
  });
}

function ignoredText(count: number): string {
  return `${count} ${count === 1 ? "alarm" : "alarms"} ignored`;
}

export function evaluateAlarmsV1(fields: FieldAccessorV1, ctx: SectionContextV1): SectionResultV1 {
  const alarms = readAlarmEntriesV1(fields, ctx);
  const active = alarms.filter((a) => !a.ignored);
  const ignoredCount = alarms.length - active.length;

  const metrics: MetricV1[] = [{ label: "alarms_present", value: alarms.length, uom: "c" }];
  const fragments: ReportFragmentV1[] = [];

  if (active.length > 0) {
    fragments.push(fragment("CRITICAL", `alarms: ${renderAlarmNamesV1(active, ctx.uptime).join(", ")}`));
    if (ignoredCount > 0) fragments.push(fragment("CRITICAL", ignoredText(ignoredCount)));
  } else if (ignoredCount > 0) {
    fragments.push(fragment("OK", ignoredText(ignoredCount)));
  } else {
    fragments.push(fragment("OK", "no alarms"));
  }

  return { metrics, fragments };
}
