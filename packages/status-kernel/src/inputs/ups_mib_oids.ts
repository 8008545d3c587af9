// Status Kernel - UPS-MIB identifiers (RFC 1628)
//
// Every identifier the kernel reads is listed here. Table columns are
// addressed as <column>.<row>, rows numbered from 1.

const MIB2 = "1.3.6.1.2.1";
const UPS_MIB = `${MIB2}.33.1`;

export const UPS_OIDS_V1 = Object.freeze({
  sysUpTime: `${MIB2}.1.3.0`,

  identManufacturer: `${UPS_MIB}.1.1.0`,
  identModel: `${UPS_MIB}.1.2.0`,

  batteryStatus: `${UPS_MIB}.2.1.0`,
  secondsOnBattery: `${UPS_MIB}.2.2.0`,
  estimatedMinutesRemaining: `${UPS_MIB}.2.3.0`,
  estimatedChargeRemaining: `${UPS_MIB}.2.4.0`,
  batteryVoltage: `${UPS_MIB}.2.5.0`,
  batteryCurrent: `${UPS_MIB}.2.6.0`,
  batteryTemperature: `${UPS_MIB}.2.7.0`,

  inputLineBads: `${UPS_MIB}.3.1.0`,
  inputNumLines: `${UPS_MIB}.3.2.0`,

  outputSource: `${UPS_MIB}.4.1.0`,
  outputFrequency: `${UPS_MIB}.4.2.0`,
  outputNumLines: `${UPS_MIB}.4.3.0`,

  bypassFrequency: `${UPS_MIB}.5.1.0`,
  bypassNumLines: `${UPS_MIB}.5.2.0`,

  alarmsPresent: `${UPS_MIB}.6.1.0`,

  testId: `${UPS_MIB}.7.1.0`,
  testResultsSummary: `${UPS_MIB}.7.3.0`,
  testStartTime: `${UPS_MIB}.7.5.0`
} as const);

/** upsWellKnownAlarms: alarm N is `${UPS_WELL_KNOWN_ALARMS_OID}.N`. */
export const UPS_WELL_KNOWN_ALARMS_OID = `${UPS_MIB}.6.3`;

/** upsWellKnownTests: test N is `${UPS_WELL_KNOWN_TESTS_OID}.N`. */
export const UPS_WELL_KNOWN_TESTS_OID = `${UPS_MIB}.7.7`;

export const INPUT_COLUMNS_V1 = Object.freeze({ frequency: 2, voltage: 3, current: 4, truePower: 5 } as const);
export const OUTPUT_COLUMNS_V1 = Object.freeze({ voltage: 2, current: 3, power: 4, percentLoad: 5 } as const);
export const BYPASS_COLUMNS_V1 = Object.freeze({ voltage: 2, current: 3, power: 4 } as const);
export const ALARM_COLUMNS_V1 = Object.freeze({ descr: 2, time: 3 } as const);

export function inputLineOid(column: number, line: number): string {
  return `${UPS_MIB}.3.3.1.${column}.${line}`;
}

export function outputLineOid(column: number, line: number): string {
  return `${UPS_MIB}.4.4.1.${column}.${line}`;
}

export function bypassLineOid(column: number, line: number): string {
  return `${UPS_MIB}.5.3.1.${column}.${line}`;
}

export function alarmEntryOid(column: number, row: number): string {
  return `${UPS_MIB}.6.2.1.${column}.${row}`;
}

/**
 * First fetch round: fixed scalars, including the four counts that size the second round.
 */
export const PHASE_ONE_OIDS_V1: ReadonlyArray<string> = Object.freeze([
  UPS_OIDS_V1.sysUpTime,
  UPS_OIDS_V1.identManufacturer,
  UPS_OIDS_V1.identModel,
  UPS_OIDS_V1.batteryStatus,
  UPS_OIDS_V1.secondsOnBattery,
  UPS_OIDS_V1.estimatedMinutesRemaining,
  UPS_OIDS_V1.estimatedChargeRemaining,
  UPS_OIDS_V1.batteryVoltage,
  UPS_OIDS_V1.batteryCurrent,
  UPS_OIDS_V1.batteryTemperature,
  UPS_OIDS_V1.inputLineBads,
  UPS_OIDS_V1.inputNumLines,
  UPS_OIDS_V1.outputSource,
  UPS_OIDS_V1.outputFrequency,
  UPS_OIDS_V1.outputNumLines,
  UPS_OIDS_V1.bypassFrequency,
  UPS_OIDS_V1.bypassNumLines,
  UPS_OIDS_V1.alarmsPresent,
  UPS_OIDS_V1.testId,
  UPS_OIDS_V1.testResultsSummary,
  UPS_OIDS_V1.testStartTime
]);

export interface LineCountsV1 {
  input: number;
  output: number;
  bypass: number;
  alarms: number;
}

/**
 * Second fetch round: every per-line and per-alarm identifier implied by the counts.
 */
export function buildPhaseTwoOidsV1(counts: LineCountsV1): ReadonlyArray<string> {
  const oids: string[] = [];

  for (let line = 1; line <= counts.input; line++) {
    for (const column of Object.values(INPUT_COLUMNS_V1)) oids.push(inputLineOid(column, line));
  }
  for (let line = 1; line <= counts.output; line++) {
    for (const column of Object.values(OUTPUT_COLUMNS_V1)) oids.push(outputLineOid(column, line));
  }
  for (let line = 1; line <= counts.bypass; line++) {
    for (const column of Object.values(BYPASS_COLUMNS_V1)) oids.push(bypassLineOid(column, line));
  }
  for (let row = 1; row <= counts.alarms; row++) {
    for (const column of Object.values(ALARM_COLUMNS_V1)) oids.push(alarmEntryOid(column, row));
  }

  return Object.freeze(oids);
}
