import assert from "node:assert/strict";
import { test } from "node:test";

import { maxSeverityV1, parseProbeVerdictV1, parseRawValueV1, severityRankV1 } from "../index";

test("severity ranks follow OK < WARNING < CRITICAL < UNKNOWN", () => {
  assert.ok(severityRankV1("OK") < severityRankV1("WARNING"));
  assert.ok(severityRankV1("WARNING") < severityRankV1("CRITICAL"));
  assert.ok(severityRankV1("CRITICAL") < severityRankV1("UNKNOWN"));
});

test("maxSeverityV1 never lowers the level", () => {
  assert.equal(maxSeverityV1("CRITICAL", "WARNING"), "CRITICAL");
  assert.equal(maxSeverityV1("WARNING", "CRITICAL"), "CRITICAL");
  assert.equal(maxSeverityV1("OK", "WARNING"), "WARNING");
  assert.equal(maxSeverityV1("OK", "OK"), "OK");
});

test("raw values accept text and finite numbers only", () => {
  assert.equal(parseRawValueV1("42"), "42");
  assert.equal(parseRawValueV1(42), 42);
  assert.throws(() => parseRawValueV1(Number.NaN));
  assert.throws(() => parseRawValueV1({ value: 1 }));
});

test("UNKNOWN verdicts must not carry metrics", () => {
  const base = {
    type: "ups_probe_verdict_v1",
    schema_version: "1.0.0",
    evaluated_at_ts: 1700000000000,
    target: { host: "ups.example.test", port: 161 },
    status: "UNKNOWN",
    message: "FIELD_MISSING: battery status @ 1.3.6.1.2.1.33.1.2.1.0"
  };

  assert.equal(parseProbeVerdictV1({ ...base, metrics: [] }).status, "UNKNOWN");
  assert.throws(() =>
    parseProbeVerdictV1({ ...base, metrics: [{ label: "alarms_present", value: 0, uom: "c" }] })
  );
});

test("verdicts reject extra fields", () => {
  assert.throws(() =>
    parseProbeVerdictV1({
      type: "ups_probe_verdict_v1",
      schema_version: "1.0.0",
      evaluated_at_ts: 1,
      target: { host: "ups", port: 161 },
      status: "OK",
      message: "UPS: no alarms",
      metrics: [],
      explanation: "not allowed"
    })
  );
});
