import { z } from "zod";

export const SeverityV1Z = z.enum(["OK", "WARNING", "CRITICAL", "UNKNOWN"]); // Four-level monitoring convention.

export type SeverityV1 = z.infer<typeof SeverityV1Z>;

/**
 * Severities an evaluation can reach; UNKNOWN is reserved for fatal input/configuration errors.
 */
export type EvaluatedSeverityV1 = Exclude<SeverityV1, "UNKNOWN">;

const SEVERITY_RANK_V1: Readonly<Record<SeverityV1, number>> = Object.freeze({
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3
});

export function severityRankV1(severity: SeverityV1): number {
  return SEVERITY_RANK_V1[severity];
}

/**
 * Returns the higher of two severities. Folding with this never lowers the running level.
 */
export function maxSeverityV1<S extends SeverityV1>(a: S, b: S): S {
  return severityRankV1(b) > severityRankV1(a) ? b : a;
}
