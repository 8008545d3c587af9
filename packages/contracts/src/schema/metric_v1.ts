import { z } from "zod"; // Metric shape shared by the kernel (producer) and the probe output (consumer).

export const MetricThresholdV1Z = z
  .object({
    warning: z.string().min(1).optional(), // Range text exactly as configured, e.g. "80" or "@10:20".
    critical: z.string().min(1).optional()
  })
  .strict();

export const MetricV1Z = z
  .object({
    label: z.string().min(1), // Stable perfdata label, e.g. "output1_load".
    value: z.number().finite(),
    uom: z.string(), // Unit of measure; may be empty.
    min: z.number().finite().optional(), // Rendered as 0 when absent.
    max: z.number().finite().optional(), // Empty when unbounded.
    threshold: MetricThresholdV1Z.optional()
  })
  .strict(); // No free-form annotations on metrics.

export type MetricThresholdV1 = z.infer<typeof MetricThresholdV1Z>;
export type MetricV1 = z.infer<typeof MetricV1Z>;
