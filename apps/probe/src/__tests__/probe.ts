import assert from "node:assert/strict";
import { test } from "node:test";

import { validateProbeOptionsV1, type RawProbeOptionsV1 } from "@upsmon/options-validator";
import { UPS_OIDS_V1 } from "@upsmon/status-kernel";

import { createSilentLogger } from "../logger";
import { renderPluginOutputV1 } from "../output/plugin_output";
import { runProbeV1 } from "../probe";
import type { UpsValueSourceV1 } from "../transport/types";
import { FakeUpsSource, healthyUpsValues } from "./fake_ups";

const logger = createSilentLogger();
const NOW = 1_700_000_000_000;

function settings(extra: Omit<RawProbeOptionsV1, "hostname"> = {}) {
  return validateProbeOptionsV1({ hostname: "ups.example.test", ...extra });
}

test("healthy UPS yields an OK verdict", async () => {
  const source = new FakeUpsSource(healthyUpsValues());
  const verdict = await runProbeV1(settings(), source, logger, () => NOW);

  assert.equal(verdict.status, "OK");
  assert.equal(
    verdict.message,
    "Acme PowerBox 3000: battery normal (80%; 45min), output normal (max load 60%), no alarms, no test"
  );
  assert.equal(verdict.evaluated_at_ts, NOW);
  assert.deepEqual(verdict.target, { host: "ups.example.test", port: 161 });
  assert.equal(verdict.metrics.length, 6 + 5 + 9 + 1 + 1);
  assert.equal(source.closeCount, 1);
});

test("active alarms are CRITICAL", async () => {
  const verdict = await runProbeV1(settings(), new FakeUpsSource(healthyUpsValues({ alarms: [2, 3] })), logger, () => NOW);
  assert.equal(verdict.status, "CRITICAL");
  assert.equal(
    verdict.message,
    "alarms: OnBattery, LowBattery(60s), OK: battery normal (80%; 45min), output normal (max load 60%), no test"
  );
});

test("ignored alarms keep the verdict OK", async () => {
  const verdict = await runProbeV1(
    settings({ ignore: "2,upsAlarmLowBattery" }),
    new FakeUpsSource(healthyUpsValues({ alarms: [2, 3] })),
    logger,
    () => NOW
  );
  assert.equal(verdict.status, "OK");
  assert.equal(
    verdict.message,
    "Acme PowerBox 3000: battery normal (80%; 45min), output normal (max load 60%), 2 alarms ignored, no test"
  );
});

test("load thresholds raise a WARNING and reach the perfdata", async () => {
  const verdict = await runProbeV1(settings({ warning: "50" }), new FakeUpsSource(healthyUpsValues()), logger, () => NOW);
  assert.equal(verdict.status, "WARNING");
  assert.equal(
    verdict.message,
    "output line 2 load 60%, OK: battery normal (80%; 45min), output normal (max load 60%), no alarms, no test"
  );

  const out = renderPluginOutputV1(verdict, { perfdata: true });
  assert.equal(out.exitCode, 1);
  assert.ok(out.text.includes(" output1_load=40%;50;;0;100 "));
  assert.ok(out.text.includes(" output2_load=60%;50;;0;100 "));
});

test("threshold count mismatch becomes UNKNOWN", async () => {
  const source = new FakeUpsSource(healthyUpsValues());
  const verdict = await runProbeV1(settings({ warning: "50,60,70" }), source, logger, () => NOW);
  assert.equal(verdict.status, "UNKNOWN");
  assert.equal(verdict.message, "THRESHOLD_COUNT_MISMATCH: 3 load thresholds for 2 output lines (expected 1 or 2)");
  assert.deepEqual(verdict.metrics, []);
  assert.equal(source.closeCount, 1);
});

test("transport failure becomes UNKNOWN", async () => {
  const source = new FakeUpsSource(healthyUpsValues(), 1);
  const verdict = await runProbeV1(settings(), source, logger, () => NOW);
  assert.equal(verdict.status, "UNKNOWN");
  assert.equal(verdict.message, "TRANSPORT_FAILURE: ups.example.test: Request timed out");
  assert.equal(source.closeCount, 1);
});

test("missing mandatory field becomes UNKNOWN", async () => {
  const values = healthyUpsValues();
  values.delete(UPS_OIDS_V1.batteryStatus);
  const verdict = await runProbeV1(settings(), new FakeUpsSource(values), logger, () => NOW);
  assert.equal(verdict.status, "UNKNOWN");
  assert.equal(verdict.message, "FIELD_MISSING: battery status @ 1.3.6.1.2.1.33.1.2.1.0");
});

test("unexpected errors propagate and the source is still closed", async () => {
  let closed = false;
  const broken: UpsValueSourceV1 = {
    fetch: async () => {
      throw new TypeError("socket exploded");
    },
    close: () => {
      closed = true;
    }
  };
  await assert.rejects(runProbeV1(settings(), broken, logger, () => NOW), TypeError);
  assert.equal(closed, true);
});
