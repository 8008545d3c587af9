// Status Kernel - typed field parsers
//
// Each parser turns one raw transport value into a typed value or a reason.
// The accessor turns a failed parse into a fatal data error.

import { z } from "zod";
import { DottedOidZ, type RawValueV1 } from "@upsmon/contracts";

import type { CodeTable } from "../taxonomy/ups_mib_tables";

export type FieldParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type FieldParser<T> = (raw: RawValueV1) => FieldParseResult<T>;

function fromZod<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): FieldParser<T> {
  return (raw) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) return { ok: true, value: parsed.data };
    return { ok: false, reason: parsed.error.issues[0]?.message ?? "invalid value" };
  };
}

// Integers arrive as numbers from the transport, or as decimal text from fixtures and OctetStrings.
const IntegerZ = z.union([
  z.number().int("expected an integer"),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "expected an integer")
    .transform((s) => Number.parseInt(s, 10))
]);

export const integerFieldV1: FieldParser<number> = fromZod(IntegerZ);

export const unsignedFieldV1: FieldParser<number> = fromZod(IntegerZ.pipe(z.number().nonnegative("expected a non-negative integer")));

export const timeTicksFieldV1: FieldParser<number> = unsignedFieldV1;

export function rangeFieldV1(min: number, max: number): FieldParser<number> {
  return fromZod(IntegerZ.pipe(z.number().min(min, `expected ${min}..${max}`).max(max, `expected ${min}..${max}`)));
}

/**
 * Integer that must be one of the codes of a domain table.
 */
export function codeFieldV1(table: CodeTable): FieldParser<number> {
  const known = [...table.keys()].join(",");
  return fromZod(IntegerZ.refine((code) => table.has(code), { message: `expected one of ${known}` }));
}

export const oidFieldV1: FieldParser<string> = fromZod(
  z
    .string()
    .trim()
    .transform((s) => (s.startsWith(".") ? s.slice(1) : s))
    .pipe(DottedOidZ)
);

export const textFieldV1: FieldParser<string> = fromZod(
  z.union([z.string(), z.number().transform((n) => String(n))]).transform((s) => s.trim())
);
