// Varbind values to raw store values.

import { RawValueV1Z, type RawValueV1 } from "@upsmon/contracts";
import snmp, { type Varbind } from "net-snmp";

function counter64ToNumber(bytes: Buffer): number {
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  return Number(n);
}

/**
 * Raw value for one varbind, or undefined when it carries an exception
 * (noSuchObject, noSuchInstance, endOfMibView) or a value the store cannot hold.
 */
export function varbindToRawValueV1(varbind: Varbind): RawValueV1 | undefined {
  if (snmp.isVarbindError(varbind)) return undefined;

  const value: unknown = varbind.value;
  let candidate: unknown = value;
  if (Buffer.isBuffer(value)) {
    candidate = varbind.type === snmp.ObjectType.Counter64 ? counter64ToNumber(value) : value.toString("utf8");
  } else if (typeof value === "bigint") {
    candidate = Number(value);
  }
  const parsed = RawValueV1Z.safeParse(candidate);
  return parsed.success ? parsed.data : undefined;
}

export function varbindsToStoreV1(varbinds: ReadonlyArray<Varbind>): Map<string, RawValueV1> {
  const store = new Map<string, RawValueV1>();
  for (const vb of varbinds) {
    const value = varbindToRawValueV1(vb);
    if (value !== undefined) store.set(vb.oid, value);
  }
  return store;
}
