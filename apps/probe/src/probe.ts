// Probe orchestration: fetch, evaluate, wrap in a verdict.

import { parseProbeVerdictV1, type ProbeVerdictV1 } from "@upsmon/contracts";
import type { ProbeSettingsV1 } from "@upsmon/options-validator";
import { evaluateUpsStatusV1, isProbeFatalError } from "@upsmon/status-kernel";

import type { ProbeLogger } from "./logger";
import { fetchUpsValuesV1 } from "./transport/fetch_plan";
import type { UpsValueSourceV1 } from "./transport/types";

export const VERDICT_SCHEMA_VERSION = "1.0.0";

/**
 * One probe run. Configuration and data errors become UNKNOWN verdicts carrying
 * the error message and no metrics; anything else propagates. The source is
 * closed on every path.
 */
export async function runProbeV1(
  settings: ProbeSettingsV1,
  source: UpsValueSourceV1,
  logger: ProbeLogger,
  now: () => number = Date.now
): Promise<ProbeVerdictV1> {
  const envelope = {
    type: "ups_probe_verdict_v1",
    schema_version: VERDICT_SCHEMA_VERSION,
    target: settings.target
  } as const;

  try {
    const store = await fetchUpsValuesV1(source, logger);
    const evaluation = evaluateUpsStatusV1(store, settings.kernel);
    logger.info(
      { status: evaluation.status, critical: evaluation.fragments.critical, warning: evaluation.fragments.warning },
      "ups evaluated"
    );
    return parseProbeVerdictV1({
      ...envelope,
      evaluated_at_ts: now(),
      status: evaluation.status,
      message: evaluation.message,
      metrics: evaluation.metrics
    });
  } catch (err) {
    if (!isProbeFatalError(err)) throw err;
    logger.warn({ code: err.code }, err.message);
    return parseProbeVerdictV1({
      ...envelope,
      evaluated_at_ts: now(),
      status: "UNKNOWN",
      message: err.message,
      metrics: []
    });
  } finally {
    source.close();
  }
}
