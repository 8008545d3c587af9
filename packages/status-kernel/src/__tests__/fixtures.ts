// Test fixtures: an in-memory UPS-MIB snapshot with healthy defaults.

import type { RawValueV1 } from "@upsmon/contracts";

import {
  ALARM_COLUMNS_V1,
  BYPASS_COLUMNS_V1,
  INPUT_COLUMNS_V1,
  OUTPUT_COLUMNS_V1,
  UPS_OIDS_V1,
  UPS_WELL_KNOWN_ALARMS_OID,
  UPS_WELL_KNOWN_TESTS_OID,
  alarmEntryOid,
  bypassLineOid,
  inputLineOid,
  outputLineOid
} from "../inputs/ups_mib_oids";
import { DEFAULT_KERNEL_SETTINGS_V1, type StatusKernelSettingsV1 } from "../settings";

export const UPTIME = 500_000;

export interface UpsFixture {
  manufacturer?: string;
  model?: string;
  batteryStatus?: number;
  charge?: number;
  minutesRemaining?: number;
  outputSource?: number;
  outputLoads?: number[];
  inputLines?: number;
  bypassLines?: number;
  alarms?: Array<{ oid: string; time: number }>;
  testId?: string;
  testResult?: number;
  testStart?: number;
}

export function alarmOid(n: number): string {
  return `${UPS_WELL_KNOWN_ALARMS_OID}.${n}`;
}

export function testOid(n: number): string {
  return `${UPS_WELL_KNOWN_TESTS_OID}.${n}`;
}

export function buildUpsStore(f: UpsFixture = {}): Map<string, RawValueV1> {
  const store = new Map<string, RawValueV1>();
  const outputLoads = f.outputLoads ?? [];
  const inputLines = f.inputLines ?? 1;
  const bypassLines = f.bypassLines ?? 0;
  const alarms = f.alarms ?? [];

  store.set(UPS_OIDS_V1.sysUpTime, UPTIME);
  store.set(UPS_OIDS_V1.identManufacturer, f.manufacturer ?? "Acme");
  store.set(UPS_OIDS_V1.identModel, f.model ?? "PowerBox 3000");

  store.set(UPS_OIDS_V1.batteryStatus, f.batteryStatus ?? 2);
  store.set(UPS_OIDS_V1.secondsOnBattery, 0);
  store.set(UPS_OIDS_V1.estimatedMinutesRemaining, f.minutesRemaining ?? 45);
  store.set(UPS_OIDS_V1.estimatedChargeRemaining, f.charge ?? 80);
  store.set(UPS_OIDS_V1.batteryVoltage, "545");
  store.set(UPS_OIDS_V1.batteryCurrent, -12);
  store.set(UPS_OIDS_V1.batteryTemperature, 25);

  store.set(UPS_OIDS_V1.inputLineBads, 3);
  store.set(UPS_OIDS_V1.inputNumLines, inputLines);
  for (let line = 1; line <= inputLines; line++) {
    store.set(inputLineOid(INPUT_COLUMNS_V1.frequency, line), 500);
    store.set(inputLineOid(INPUT_COLUMNS_V1.voltage, line), 2300);
    store.set(inputLineOid(INPUT_COLUMNS_V1.current, line), 12);
    store.set(inputLineOid(INPUT_COLUMNS_V1.truePower, line), 280);
  }

  store.set(UPS_OIDS_V1.outputSource, f.outputSource ?? 3);
  store.set(UPS_OIDS_V1.outputFrequency, 499);
  store.set(UPS_OIDS_V1.outputNumLines, outputLoads.length);
  outputLoads.forEach((load, i) => {
    const line = i + 1;
    store.set(outputLineOid(OUTPUT_COLUMNS_V1.voltage, line), 2300);
    store.set(outputLineOid(OUTPUT_COLUMNS_V1.current, line), 15);
    store.set(outputLineOid(OUTPUT_COLUMNS_V1.power, line), 300);
    store.set(outputLineOid(OUTPUT_COLUMNS_V1.percentLoad, line), load);
  });

  store.set(UPS_OIDS_V1.bypassFrequency, 500);
  store.set(UPS_OIDS_V1.bypassNumLines, bypassLines);
  for (let line = 1; line <= bypassLines; line++) {
    store.set(bypassLineOid(BYPASS_COLUMNS_V1.voltage, line), 2315);
    store.set(bypassLineOid(BYPASS_COLUMNS_V1.current, line), 0);
    store.set(bypassLineOid(BYPASS_COLUMNS_V1.power, line), 0);
  }

  store.set(UPS_OIDS_V1.alarmsPresent, alarms.length);
  alarms.forEach((alarm, i) => {
    store.set(alarmEntryOid(ALARM_COLUMNS_V1.descr, i + 1), alarm.oid);
    store.set(alarmEntryOid(ALARM_COLUMNS_V1.time, i + 1), alarm.time);
  });

  store.set(UPS_OIDS_V1.testId, f.testId ?? testOid(1));
  store.set(UPS_OIDS_V1.testResultsSummary, f.testResult ?? 6);
  store.set(UPS_OIDS_V1.testStartTime, f.testStart ?? 0);

  return store;
}

export function settingsWith(overrides: Partial<StatusKernelSettingsV1> = {}): StatusKernelSettingsV1 {
  return { ...DEFAULT_KERNEL_SETTINGS_V1, ...overrides };
}
