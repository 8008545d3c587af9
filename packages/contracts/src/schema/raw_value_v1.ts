import { z } from "zod"; // Runtime validation for values handed over by the transport.

export const DottedOidZ = z
  .string()
  .regex(/^\d+(\.\d+)+$/, "identifier must be dotted decimal without a leading dot"); // Canonical key form in the store.

export const RawValueV1Z = z.union([
  z.string(), // OctetString / OID / anything the transport rendered as text.
  z.number().finite() // Integer, Gauge, Counter, TimeTicks.
]);

export type RawValueV1 = z.infer<typeof RawValueV1Z>;

/**
 * Identifier -> raw value, filled once by the fetch rounds and read-only afterwards.
 */
export type ValueStoreV1 = ReadonlyMap<string, RawValueV1>;

export function parseRawValueV1(input: unknown): RawValueV1 {
  return RawValueV1Z.parse(input); // Throws on anything a transport must not hand over (objects, NaN, ...).
}
