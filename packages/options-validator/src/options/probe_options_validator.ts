import type { z } from "zod"; // Schema type only; the schemas themselves live beside this file.

import { ProbeConfigError, type StatusKernelSettingsV1 } from "@upsmon/status-kernel"; // Fatal configuration errors come from the kernel's taxonomy.

import { parseAlarmIgnoreListV1 } from "./alarm_ignore";
import { buildLoadThresholdsV1 } from "./load_thresholds";
import {
  AuthProtocolOptionZ,
  NonEmptyOptionZ,
  PortOptionZ,
  PrivProtocolOptionZ,
  ProtocolOptionZ,
  RawProbeOptionsV1Z,
  RetriesOptionZ,
  TimeoutOptionZ
} from "./probe_options_zod";
import type { ProbeSettingsV1, SessionSettingsV1, SnmpV3SecurityV1 } from "./probe_settings_types";

export const PROBE_DEFAULTS_V1 = Object.freeze({
  port: "161",
  protocol: "2c",
  community: "public",
  authprotocol: "sha",
  privprotocol: "aes",
  timeout: "5",
  retries: "1"
});

function parseOption<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, value: string, option: string): T {
  const res = schema.safeParse(value);
  if (res.success) return res.data;
  const reason = res.error.issues[0]?.message ?? "invalid value";
  throw new ProbeConfigError("INVALID_OPTION", `--${option} "${value}": ${reason}`); // One line, option name first.
}

function buildSecurity(opts: {
  authprotocol: string;
  authpassword?: string;
  privprotocol: string;
  privpassword?: string;
}): SnmpV3SecurityV1 {
  if (opts.authpassword === undefined) {
    if (opts.privpassword !== undefined) {
      throw new ProbeConfigError("INVALID_OPTION", "--privpassword requires --authpassword"); // No privacy without authentication.
    }
    return { level: "noAuthNoPriv" };
  }

  const authProtocol = parseOption(AuthProtocolOptionZ, opts.authprotocol, "authprotocol");
  const authPassword = parseOption(NonEmptyOptionZ, opts.authpassword, "authpassword");
  if (opts.privpassword === undefined) {
    return { level: "authNoPriv", authProtocol, authPassword };
  }

  return {
    level: "authPriv",
    authProtocol,
    authPassword,
    privProtocol: parseOption(PrivProtocolOptionZ, opts.privprotocol, "privprotocol"),
    privPassword: parseOption(NonEmptyOptionZ, opts.privpassword, "privpassword")
  };
}

export function validateProbeOptionsV1(input: unknown): ProbeSettingsV1 {
  const shape = RawProbeOptionsV1Z.safeParse(input); // First gate: closed shape.
  if (!shape.success) {
    const issue = shape.error.issues[0];
    const where = issue?.path.join(".") || "options";
    throw new ProbeConfigError("INVALID_OPTION", `${where}: ${issue?.message ?? "invalid"}`);
  }
  const raw = shape.data;

  const host = raw.hostname?.trim() ?? "";
  if (host === "") {
    throw new ProbeConfigError("HOST_REQUIRED", "a target host is required (-H)");
  }

  const port = parseOption(PortOptionZ, raw.port ?? PROBE_DEFAULTS_V1.port, "port");
  const version = parseOption(ProtocolOptionZ, raw.protocol ?? PROBE_DEFAULTS_V1.protocol, "protocol");
  const timeoutMs = Math.round(parseOption(TimeoutOptionZ, raw.timeout ?? PROBE_DEFAULTS_V1.timeout, "timeout") * 1000);
  const retries = parseOption(RetriesOptionZ, raw.retries ?? PROBE_DEFAULTS_V1.retries, "retries");

  let session: SessionSettingsV1;
  if (version === "3") {
    if (raw.username === undefined || raw.username === "") {
      throw new ProbeConfigError("INVALID_OPTION", "--username is required for protocol 3");
    }
    const security = buildSecurity({
      authprotocol: raw.authprotocol ?? PROBE_DEFAULTS_V1.authprotocol,
      authpassword: raw.authpassword,
      privprotocol: raw.privprotocol ?? PROBE_DEFAULTS_V1.privprotocol,
      privpassword: raw.privpassword
    });
    session = { version, username: raw.username, security, timeoutMs, retries };
  } else {
    const community = parseOption(NonEmptyOptionZ, raw.community ?? PROBE_DEFAULTS_V1.community, "community");
    session = { version, community, timeoutMs, retries };
  }

  const kernel: StatusKernelSettingsV1 = {
    ignoredAlarmOids: parseAlarmIgnoreListV1(raw.ignore),
    loadThresholds: buildLoadThresholdsV1(raw.warning, raw.critical),
    reportTestResults: !raw.suppressTestWarnings
  };

  return {
    target: { host, port },
    session,
    kernel,
    perfdata: !raw.noPerfdata,
    verbosity: raw.verbosity
  };
}
