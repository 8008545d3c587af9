// Status Kernel - report fragments and severity aggregation
//
// Sections return their fragments; the aggregator folds them in evaluation
// order. The running level only moves up (OK < WARNING < CRITICAL), and a
// fragment keeps the severity it was created with.

import { maxSeverityV1, type EvaluatedSeverityV1, type MetricV1 } from "@upsmon/contracts";

export interface ReportFragmentV1 {
  severity: EvaluatedSeverityV1;
  text: string;
}

/**
 * What one section evaluator contributes.
 */
export interface SectionResultV1 {
  metrics: ReadonlyArray<MetricV1>;
  fragments: ReadonlyArray<ReportFragmentV1>;
}

export interface GroupedFragmentsV1 {
  critical: ReadonlyArray<string>;
  warning: ReadonlyArray<string>;
  ok: ReadonlyArray<string>;
}

export interface StatusEvaluationV1 {
  status: EvaluatedSeverityV1;
  message: string;
  metrics: ReadonlyArray<MetricV1>;
  fragments: GroupedFragmentsV1;
}

export function fragment(severity: EvaluatedSeverityV1, text: string): ReportFragmentV1 {
  return Object.freeze({ severity, text });
}

/**
 * Folds section results into one verdict and message.
 *
 * @param head - Device identification shown in front of an all-OK report.
 */
export function aggregateSectionsV1(head: string, sections: ReadonlyArray<SectionResultV1>): StatusEvaluationV1 {
  let status: EvaluatedSeverityV1 = "OK";
  const metrics: MetricV1[] = [];
  const critical: string[] = [];
  const warning: string[] = [];
  const ok: string[] = [];

  for (const section of sections) {
    metrics.push(...section.metrics);
    for (const f of section.fragments) {
      status = maxSeverityV1(status, f.severity);
      if (f.severity === "CRITICAL") critical.push(f.text);
      else if (f.severity === "WARNING") warning.push(f.text);
      else ok.push(f.text);
    }
  }

  const fragments: GroupedFragmentsV1 = Object.freeze({ critical, warning, ok });
  return Object.freeze({
    status,
    message: renderMessageV1(status, head, fragments),
    metrics: Object.freeze(metrics),
    fragments
  });
}

export function renderMessageV1(status: EvaluatedSeverityV1, head: string, fragments: GroupedFragmentsV1): string {
  if (status === "OK") {
    return fragments.ok.length ? `${head}: ${fragments.ok.join(", ")}` : head;
  }

  let out = status === "CRITICAL" ? fragments.critical.join(", ") : fragments.warning.join(", ");
  if (status === "CRITICAL" && fragments.warning.length) {
    out += `, WARNING: ${fragments.warning.join(", ")}`;
  }
  if (fragments.ok.length) {
    out += `, OK: ${fragments.ok.join(", ")}`;
  }
  return out;
}
