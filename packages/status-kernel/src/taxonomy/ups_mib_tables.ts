// Status Kernel - UPS-MIB domain tables
//
// Labels are used for rendering only. Logic branches on the codes themselves.

import { UPS_WELL_KNOWN_ALARMS_OID, UPS_WELL_KNOWN_TESTS_OID } from "../inputs/ups_mib_oids";

export type CodeTable = ReadonlyMap<number, string>;

/** upsBatteryStatus */
export const BATTERY_STATUS_V1: CodeTable = new Map([
  [1, "unknown"],
  [2, "normal"],
  [3, "low"],
  [4, "depleted"]
]);

export const BATTERY_STATUS_NORMAL = 2;

/** upsOutputSource */
export const OUTPUT_SOURCE_V1: CodeTable = new Map([
  [1, "other"],
  [2, "none"],
  [3, "normal"],
  [4, "bypass"],
  [5, "battery"],
  [6, "booster"],
  [7, "reducer"]
]);

export const OUTPUT_SOURCE_NORMAL = 3;

/** upsTestResultsSummary */
export const TEST_RESULT_V1 = Object.freeze({
  donePass: 1,
  doneWarning: 2,
  doneError: 3,
  aborted: 4,
  inProgress: 5,
  noTestsInitiated: 6
} as const);

/**
 * upsWellKnownAlarms, in MIB order (index 0 is alarm 1). Names drop the "upsAlarm" prefix.
 */
export const WELL_KNOWN_ALARM_NAMES_V1 = Object.freeze([
  "BatteryBad",
  "OnBattery",
  "LowBattery",
  "DepletedBattery",
  "TempBad",
  "InputBad",
  "OutputBad",
  "OutputOverload",
  "OnBypass",
  "BypassBad",
  "OutputOffAsRequested",
  "UpsOffAsRequested",
  "ChargerFailed",
  "UpsOutputOff",
  "UpsSystemOff",
  "FanFailure",
  "FuseFailure",
  "GeneralFault",
  "DiagnosticTestFailed",
  "CommunicationsLost",
  "AwaitingPower",
  "ShutdownPending",
  "ShutdownImminent",
  "TestInProgress"
] as const);

/**
 * upsWellKnownTests, in MIB order (index 0 is test 1).
 */
export const WELL_KNOWN_TEST_NAMES_V1 = Object.freeze([
  "NoTestsInitiated",
  "AbortTestInProgress",
  "GeneralSystemsTest",
  "QuickBatteryTest",
  "DeepBatteryCalibration"
] as const);

export const NO_TESTS_INITIATED_NAME = "NoTestsInitiated";

function indexByOid(base: string, names: ReadonlyArray<string>): ReadonlyMap<string, string> {
  return new Map(names.map((name, i) => [`${base}.${i + 1}`, name]));
}

const ALARM_NAME_BY_OID: ReadonlyMap<string, string> = indexByOid(UPS_WELL_KNOWN_ALARMS_OID, WELL_KNOWN_ALARM_NAMES_V1);
const TEST_NAME_BY_OID: ReadonlyMap<string, string> = indexByOid(UPS_WELL_KNOWN_TESTS_OID, WELL_KNOWN_TEST_NAMES_V1);

/**
 * Well-known alarm name for an identifier, or the identifier itself.
 */
export function alarmNameV1(oid: string): string {
  return ALARM_NAME_BY_OID.get(oid) ?? oid;
}

/**
 * Well-known test name for an identifier, or the identifier itself.
 */
export function testNameV1(oid: string): string {
  return TEST_NAME_BY_OID.get(oid) ?? oid;
}

export function wellKnownAlarmOidV1(index: number): string | undefined {
  if (!Number.isInteger(index) || index < 1 || index > WELL_KNOWN_ALARM_NAMES_V1.length) return undefined;
  return `${UPS_WELL_KNOWN_ALARMS_OID}.${index}`;
}

export function labelForCode(table: CodeTable, code: number): string {
  return table.get(code) ?? String(code);
}
