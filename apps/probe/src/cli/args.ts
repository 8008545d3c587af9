// Command-line tokenizer for the probe.
//
// Accepts -x value, -xvalue, --long value, --long=value and bundled short
// flags (-vv, -nsv). Produces the raw option record the options validator
// admits; no value is interpreted here beyond flag counting.

import type { RawProbeOptionsV1 } from "@upsmon/options-validator";
import { ProbeConfigError } from "@upsmon/status-kernel";

import { readEnvFallbacksV1 } from "./env";

type ValueKey =
  | "hostname"
  | "port"
  | "protocol"
  | "community"
  | "username"
  | "authprotocol"
  | "authpassword"
  | "privprotocol"
  | "privpassword"
  | "timeout"
  | "retries"
  | "ignore"
  | "warning"
  | "critical";

type FlagKey = "noPerfdata" | "suppressTestWarnings" | "verbose" | "help" | "version";

type OptionDef =
  | { short: string; long: string; kind: "value"; key: ValueKey }
  | { short: string; long: string; kind: "flag"; key: FlagKey };

const OPTIONS: ReadonlyArray<OptionDef> = [
  { short: "H", long: "hostname", kind: "value", key: "hostname" },
  { short: "p", long: "port", kind: "value", key: "port" },
  { short: "P", long: "protocol", kind: "value", key: "protocol" },
  { short: "C", long: "community", kind: "value", key: "community" },
  { short: "U", long: "username", kind: "value", key: "username" },
  { short: "a", long: "authprotocol", kind: "value", key: "authprotocol" },
  { short: "A", long: "authpassword", kind: "value", key: "authpassword" },
  { short: "x", long: "privprotocol", kind: "value", key: "privprotocol" },
  { short: "X", long: "privpassword", kind: "value", key: "privpassword" },
  { short: "t", long: "timeout", kind: "value", key: "timeout" },
  { short: "r", long: "retries", kind: "value", key: "retries" },
  { short: "i", long: "ignore", kind: "value", key: "ignore" },
  { short: "w", long: "warning", kind: "value", key: "warning" },
  { short: "c", long: "critical", kind: "value", key: "critical" },
  { short: "v", long: "verbose", kind: "flag", key: "verbose" },
  { short: "n", long: "no-perfdata", kind: "flag", key: "noPerfdata" },
  { short: "s", long: "suppress-test-warnings", kind: "flag", key: "suppressTestWarnings" },
  { short: "h", long: "help", kind: "flag", key: "help" },
  { short: "V", long: "version", kind: "flag", key: "version" }
];

export type ProbeCommandV1 =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "probe"; options: RawProbeOptionsV1 };

export const PROBE_VERSION = "0.1.0";

export const PROBE_USAGE = `Usage: ups-mib-probe -H <host> [options]

Checks a UPS through the standard UPS-MIB (RFC 1628) and prints one
monitoring-plugin status line.

  -H, --hostname <host>           agent address (required)
  -p, --port <port>               agent UDP port (default 161)
  -P, --protocol <1|2c|3>         SNMP version (default 2c)
  -C, --community <name>          v1/v2c community (default public, env UPSMON_COMMUNITY)
  -U, --username <name>           v3 user (env UPSMON_USERNAME)
  -a, --authprotocol <md5|sha>    v3 authentication protocol (default sha)
  -A, --authpassword <secret>     v3 authentication password (env UPSMON_AUTH_PASSWORD)
  -x, --privprotocol <des|aes>    v3 privacy protocol (default aes)
  -X, --privpassword <secret>     v3 privacy password (env UPSMON_PRIV_PASSWORD)
  -t, --timeout <seconds>         per-request timeout (default 5)
  -r, --retries <count>           per-request retries, 0..10 (default 1)
  -i, --ignore <list>             alarms to ignore: names, indexes 1..24 or identifiers
  -w, --warning <list>            output load warning ranges, one per line or one for all
  -c, --critical <list>           output load critical ranges, one per line or one for all
  -s, --suppress-test-warnings    do not report failed, aborted or warning self-tests
  -n, --no-perfdata               omit performance data
  -v, --verbose                   log to stderr; repeat for more detail
  -h, --help                      show this help
  -V, --version                   show the version
`;

function findShort(ch: string): OptionDef {
  const def = OPTIONS.find((o) => o.short === ch);
  if (!def) throw new ProbeConfigError("INVALID_OPTION", `unknown option -${ch}`);
  return def;
}

function findLong(name: string): OptionDef {
  const def = OPTIONS.find((o) => o.long === name);
  if (!def) throw new ProbeConfigError("INVALID_OPTION", `unknown option --${name}`);
  return def;
}

export function parseProbeArgsV1(
  argv: ReadonlyArray<string>,
  env: Record<string, string | undefined> = {}
): ProbeCommandV1 {
  const values: Partial<Record<ValueKey, string>> = {};
  const flags = { noPerfdata: false, suppressTestWarnings: false, help: false, version: false };
  let verbosity = 0;
  const operands: string[] = [];

  const applyFlag = (key: FlagKey): void => {
    if (key === "verbose") verbosity += 1;
    else flags[key] = true;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "--") {
      operands.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      const def = findLong(name);
      if (def.kind === "flag") {
        if (eq !== -1) throw new ProbeConfigError("INVALID_OPTION", `option --${name} takes no value`);
        applyFlag(def.key);
        continue;
      }
      if (eq !== -1) {
        values[def.key] = arg.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (next === undefined) throw new ProbeConfigError("INVALID_OPTION", `option --${name} requires a value`);
      values[def.key] = next;
      i++;
      continue;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      for (let j = 1; j < arg.length; j++) {
        const def = findShort(arg.charAt(j));
        if (def.kind === "flag") {
          applyFlag(def.key);
          continue;
        }
        const attached = arg.slice(j + 1);
        if (attached !== "") {
          values[def.key] = attached;
        } else {
          const next = argv[i + 1];
          if (next === undefined) throw new ProbeConfigError("INVALID_OPTION", `option -${def.short} requires a value`);
          values[def.key] = next;
          i++;
        }
        break; // The value consumed the rest of this token.
      }
      continue;
    }

    operands.push(arg);
  }

  if (flags.help) return { kind: "help" };
  if (flags.version) return { kind: "version" };

  if (operands.length > 0) {
    throw new ProbeConfigError("SURPLUS_OPERAND", `unexpected argument "${operands[0]}"`);
  }

  const fallbacks = readEnvFallbacksV1(env);
  return {
    kind: "probe",
    options: {
      ...values,
      community: values.community ?? fallbacks.community,
      username: values.username ?? fallbacks.username,
      authpassword: values.authpassword ?? fallbacks.authpassword,
      privpassword: values.privpassword ?? fallbacks.privpassword,
      noPerfdata: flags.noPerfdata,
      suppressTestWarnings: flags.suppressTestWarnings,
      verbosity
    }
  };
}
