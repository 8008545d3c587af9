import { z } from "zod"; // Verdict contract: the only thing the probe hands to its output layer.

import { MetricV1Z } from "./metric_v1";
import { SeverityV1Z } from "./severity_v1";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // schema_version is SemVer, never free text.

const TargetZ = z
  .object({
    host: z.string().min(1), // Device address as given on the command line.
    port: z.number().int().min(1).max(65535)
  })
  .strict();

export const ProbeVerdictV1Z = z
  .object({
    type: z.literal("ups_probe_verdict_v1"), // Discriminator.
    schema_version: SemVerZ,
    evaluated_at_ts: z.number().int().nonnegative(), // ms timestamp of the evaluation.
    target: TargetZ,
    status: SeverityV1Z,
    message: z.string().min(1), // Single-line human summary.
    metrics: z.array(MetricV1Z) // Discovery order; empty for UNKNOWN verdicts.
  })
  .strict()
  .refine((v) => v.status !== "UNKNOWN" || v.metrics.length === 0, {
    message: "UNKNOWN verdicts must not carry metrics" // A failed run never reports partial measurements.
  });

export type ProbeVerdictV1 = z.infer<typeof ProbeVerdictV1Z>;

export function parseProbeVerdictV1(input: unknown): ProbeVerdictV1 {
  return ProbeVerdictV1Z.parse(input); // Throws on shape drift before anything is printed.
}
