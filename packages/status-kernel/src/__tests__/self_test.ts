import assert from "node:assert/strict";
import { test } from "node:test";

import { FieldAccessorV1 } from "../inputs/field_accessor";
import { evaluateSelfTestV1 } from "../sections/self_test";
import { buildUpsStore, settingsWith, testOid, UPTIME, type UpsFixture } from "./fixtures";

function run(f: UpsFixture, reportTestResults = true) {
  return evaluateSelfTestV1(new FieldAccessorV1(buildUpsStore(f)), {
    settings: settingsWith({ reportTestResults }),
    uptime: UPTIME
  }).fragments;
}

test("no tests initiated reports 'no test' whatever the identifier or suppression", () => {
  assert.deepEqual(run({ testId: testOid(4), testResult: 6 }), [{ severity: "OK", text: "no test" }]);
  assert.deepEqual(run({ testId: testOid(4), testResult: 6 }, false), [{ severity: "OK", text: "no test" }]);
  assert.deepEqual(run({ testId: testOid(1), testResult: 3 }), [{ severity: "OK", text: "no test" }]);
});

test("running test shows elapsed time since its start", () => {
  assert.deepEqual(run({ testId: testOid(4), testResult: 5, testStart: 470_000 }), [
    { severity: "OK", text: "test running: QuickBatteryTest (300s)" }
  ]);
});

test("passed test is OK", () => {
  assert.deepEqual(run({ testId: testOid(3), testResult: 1 }), [{ severity: "OK", text: "test passed: GeneralSystemsTest" }]);
});

test("warning, error and aborted results escalate", () => {
  assert.deepEqual(run({ testId: testOid(5), testResult: 2 }), [
    { severity: "WARNING", text: "test warning: DeepBatteryCalibration" }
  ]);
  assert.deepEqual(run({ testId: testOid(4), testResult: 3 }), [{ severity: "CRITICAL", text: "test failed: QuickBatteryTest" }]);
  assert.deepEqual(run({ testId: testOid(2), testResult: 4 }), [{ severity: "WARNING", text: "test aborted: AbortTestInProgress" }]);
});

test("suppressed results and unknown codes report nothing", () => {
  assert.deepEqual(run({ testId: testOid(4), testResult: 3 }, false), []);
  assert.deepEqual(run({ testId: testOid(4), testResult: 2 }, false), []);
  assert.deepEqual(run({ testId: testOid(4), testResult: 9 }), []);
});

test("vendor test identifiers are shown as-is", () => {
  assert.deepEqual(run({ testId: "1.3.6.1.4.1.99.2.1", testResult: 1 }), [
    { severity: "OK", text: "test passed: 1.3.6.1.4.1.99.2.1" }
  ]);
});
