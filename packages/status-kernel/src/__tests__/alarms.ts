import assert from "node:assert/strict";
import { test } from "node:test";

import { FieldAccessorV1 } from "../inputs/field_accessor";
import { evaluateAlarmsV1, readAlarmEntriesV1, renderAlarmNamesV1, type AlarmEntryV1 } from "../sections/alarms";
import type { SectionContextV1 } from "../settings";
import { alarmOid, buildUpsStore, settingsWith, UPTIME } from "./fixtures";

function run(alarms: Array<{ oid: string; time: number }>, ignored: string[] = []) {
  const ctx: SectionContextV1 = { settings: settingsWith({ ignoredAlarmOids: new Set(ignored) }), uptime: UPTIME };
  return evaluateAlarmsV1(new FieldAccessorV1(buildUpsStore({ alarms })), ctx);
}

function entry(name: string, time: number): AlarmEntryV1 {
  return { oid: name, name, time, ignored: false };
}

test("no alarms reports OK", () => {
  const result = run([]);
  assert.deepEqual(result.fragments, [{ severity: "OK", text: "no alarms" }]);
  assert.deepEqual(result.metrics, [{ label: "alarms_present", value: 0, uom: "c" }]);
});

test("a run of equal activation times shows the duration on its last member", () => {
  assert.deepEqual(
    renderAlarmNamesV1([entry("A", 494_000), entry("B", 494_000), entry("C", 494_000)], UPTIME),
    ["A", "B", "C(60s)"]
  );
});

test("each run of equal activation times gets its own duration", () => {
  assert.deepEqual(
    renderAlarmNamesV1([entry("A", 140_000), entry("B", 140_000), entry("C", 494_000)], UPTIME),
    ["A", "B(1h)", "C(60s)"]
  );
  assert.deepEqual(renderAlarmNamesV1([entry("Solo", 499_900)], UPTIME), ["Solo(1s)"]);
});

test("active alarms are CRITICAL and listed by well-known name", () => {
  const result = run([
    { oid: alarmOid(2), time: 494_000 },
    { oid: alarmOid(3), time: 494_000 }
  ]);
  assert.deepEqual(result.fragments, [{ severity: "CRITICAL", text: "alarms: OnBattery, LowBattery(60s)" }]);
  assert.deepEqual(result.metrics, [{ label: "alarms_present", value: 2, uom: "c" }]);
});

test("unknown alarm identifiers are shown as-is", () => {
  const result = run([{ oid: ".1.3.6.1.4.1.99.1.5", time: 494_000 }]);
  assert.deepEqual(result.fragments, [{ severity: "CRITICAL", text: "alarms: 1.3.6.1.4.1.99.1.5(60s)" }]);
});

test("ignored alarms are counted next to the active ones", () => {
  const result = run(
    [
      { oid: alarmOid(2), time: 494_000 },
      { oid: alarmOid(24), time: 494_000 },
      { oid: alarmOid(8), time: 494_000 }
    ],
    [alarmOid(24)]
  );
  assert.deepEqual(result.fragments, [
    { severity: "CRITICAL", text: "alarms: OnBattery, OutputOverload(60s)" },
    { severity: "CRITICAL", text: "1 alarm ignored" }
  ]);
  assert.deepEqual(result.metrics, [{ label: "alarms_present", value: 3, uom: "c" }]);
});

test("only ignored alarms report OK with a pluralized count", () => {
  const result = run(
    [
      { oid: alarmOid(24), time: 494_000 },
      { oid: alarmOid(11), time: 300_000 }
    ],
    [alarmOid(24), alarmOid(11)]
  );
  assert.deepEqual(result.fragments, [{ severity: "OK", text: "2 alarms ignored" }]);

  const single = run([{ oid: alarmOid(24), time: 494_000 }], [alarmOid(24)]);
  assert.deepEqual(single.fragments, [{ severity: "OK", text: "1 alarm ignored" }]);
});

test("alarm entries carry identifier, name, time and ignore flag", () => {
  const ctx: SectionContextV1 = { settings: settingsWith({ ignoredAlarmOids: new Set([alarmOid(2)]) }), uptime: UPTIME };
  const entries = readAlarmEntriesV1(
    new FieldAccessorV1(buildUpsStore({ alarms: [{ oid: "." + alarmOid(2), time: 42 }] })),
    ctx
  );
  assert.deepEqual(entries, [{ oid: alarmOid(2), name: "OnBattery", time: 42, ignored: true }]);
});
