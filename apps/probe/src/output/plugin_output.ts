// Monitoring-plugin output: one status line on stdout and an exit code.
//
//   UPS <STATUS> - <message>[ | <label>=<value><uom>;<warn>;<crit>;<min>;<max> ...]

import type { MetricV1, ProbeVerdictV1, SeverityV1 } from "@upsmon/contracts";

export const EXIT_CODES_V1: Readonly<Record<SeverityV1, number>> = Object.freeze({
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3
});

export type PluginOutputV1 = {
  text: string;
  exitCode: number;
};

const PLAIN_LABEL_RE = /^[A-Za-z0-9_.-]+$/;

export function formatPerfLabelV1(label: string): string {
  if (PLAIN_LABEL_RE.test(label)) return label;
  return `'${label.replace(/'/g, "''")}'`;
}

export function formatPerfMetricV1(metric: MetricV1): string {
  const fields = [
    `${metric.value}${metric.uom}`,
    metric.threshold?.warning ?? "",
    metric.threshold?.critical ?? "",
    String(metric.min ?? 0),
    metric.max === undefined ? "" : String(metric.max)
  ];
  while (fields.length > 1 && fields[fields.length - 1] === "") fields.pop();
  return `${formatPerfLabelV1(metric.label)}=${fields.join(";")}`;
}

// Status text must stay on one line and must not open the perfdata section.
function sanitizeMessage(message: string): string {
  return message.replace(/[\r\n]+/g, " ").replace(/\|/g, "/");
}

export function renderPluginOutputV1(verdict: ProbeVerdictV1, opts: { perfdata: boolean }): PluginOutputV1 {
  let text = `UPS ${verdict.status} - ${sanitizeMessage(verdict.message)}`;
  if (opts.perfdata && verdict.metrics.length > 0) {
    text += ` | ${verdict.metrics.map(formatPerfMetricV1).join(" ")}`;
  }
  return { text, exitCode: EXIT_CODES_V1[verdict.status] };
}

/**
 * Line for failures that happen before a verdict exists (bad options, crashes).
 */
export function renderUnknownLineV1(message: string): PluginOutputV1 {
  return { text: `UPS UNKNOWN - ${sanitizeMessage(message)}`, exitCode: EXIT_CODES_V1.UNKNOWN };
}
