import { z } from "zod"; // zod: option text is external input, parsed before anything uses it.

// Raw option record as produced by the argv tokenizer. Values are still text;
// flags are booleans; verbosity is a repeat count.
export const RawProbeOptionsV1Z = z
  .object({
    hostname: z.string().optional(),
    port: z.string().optional(),
    protocol: z.string().optional(),
    community: z.string().optional(),
    username: z.string().optional(),
    authprotocol: z.string().optional(),
    authpassword: z.string().optional(),
    privprotocol: z.string().optional(),
    privpassword: z.string().optional(),
    timeout: z.string().optional(),
    retries: z.string().optional(),
    ignore: z.string().optional(),
    warning: z.string().optional(),
    critical: z.string().optional(),
    noPerfdata: z.boolean().default(false),
    suppressTestWarnings: z.boolean().default(false),
    verbosity: z.number().int().nonnegative().default(0)
  })
  .strict(); // Unknown keys mean the tokenizer and validator drifted apart.

export type RawProbeOptionsV1 = z.input<typeof RawProbeOptionsV1Z>;

const DecimalTextZ = z
  .string()
  .trim()
  .regex(/^\d+$/, "expected a decimal integer")
  .transform((s) => Number(s));

export const PortOptionZ = DecimalTextZ.pipe(
  z.number().int().min(1, "expected 1..65535").max(65535, "expected 1..65535")
);

export const RetriesOptionZ = DecimalTextZ.pipe(z.number().int().max(10, "expected 0..10"));

export const TimeoutOptionZ = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "expected seconds")
  .transform((s) => Number(s))
  .pipe(z.number().positive("expected seconds > 0"));

export const ProtocolOptionZ = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "2c", "3"], { errorMap: () => ({ message: "expected 1, 2c or 3" }) }));

export const AuthProtocolOptionZ = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["md5", "sha"], { errorMap: () => ({ message: "expected md5 or sha" }) }));

export const PrivProtocolOptionZ = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["des", "aes"], { errorMap: () => ({ message: "expected des or aes" }) }));

export const NonEmptyOptionZ = z.string().min(1, "must not be empty");
