// Ignore-list tokens: well-known alarm names, their MIB index, or a dotted
// identifier. Every accepted form resolves to the dotted identifier the
// device reports in upsAlarmDescr.

import {
  ProbeConfigError,
  UPS_WELL_KNOWN_ALARMS_OID,
  WELL_KNOWN_ALARM_NAMES_V1,
  wellKnownAlarmOidV1
} from "@upsmon/status-kernel";

const NAME_PREFIX = "upsalarm";
const DOTTED_RE = /^\.?\d+(\.\d+)+$/;

function unsupported(token: string): ProbeConfigError {
  return new ProbeConfigError(
    "UNSUPPORTED_ALARM_TOKEN",
    `"${token}" is not a well-known alarm name, an index 1..${WELL_KNOWN_ALARM_NAMES_V1.length} or a dotted identifier`
  );
}

export function resolveAlarmIgnoreTokenV1(input: string): string {
  const token = input.trim();

  if (/^\d+$/.test(token)) {
    const oid = wellKnownAlarmOidV1(Number(token));
    if (oid === undefined) throw unsupported(token);
    return oid;
  }

  if (DOTTED_RE.test(token)) return token.replace(/^\./, "");

  let name = token.toLowerCase();
  if (name.startsWith(NAME_PREFIX)) name = name.slice(NAME_PREFIX.length);
  const index = WELL_KNOWN_ALARM_NAMES_V1.findIndex((n) => n.toLowerCase() === name);
  if (name === "" || index === -1) throw unsupported(token);

  return `${UPS_WELL_KNOWN_ALARMS_OID}.${index + 1}`;
}

/**
 * Comma-separated ignore list to a set of alarm identifiers. Blank input is an empty set.
 */
export function parseAlarmIgnoreListV1(list: string | undefined): ReadonlySet<string> {
  const out = new Set<string>();
  if (list === undefined || list.trim() === "") return out;
  for (const token of list.split(",")) out.add(resolveAlarmIgnoreTokenV1(token));
  return out;
}
