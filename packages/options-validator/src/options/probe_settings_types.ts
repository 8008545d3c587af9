import type { StatusKernelSettingsV1 } from "@upsmon/status-kernel"; // Kernel settings travel unchanged into the evaluation.

export type SnmpVersionV1 = "1" | "2c" | "3"; // Protocol as written on the command line.
export type AuthProtocolV1 = "md5" | "sha";
export type PrivProtocolV1 = "des" | "aes";

export type SnmpV3SecurityV1 =
  | { level: "noAuthNoPriv" } // Username only.
  | { level: "authNoPriv"; authProtocol: AuthProtocolV1; authPassword: string }
  | {
      level: "authPriv";
      authProtocol: AuthProtocolV1;
      authPassword: string;
      privProtocol: PrivProtocolV1;
      privPassword: string;
    };

export type SessionSettingsV1 =
  | { version: "1" | "2c"; community: string; timeoutMs: number; retries: number }
  | { version: "3"; username: string; security: SnmpV3SecurityV1; timeoutMs: number; retries: number };

export type ProbeTargetV1 = {
  host: string;
  port: number; // Agent UDP port.
};

export type ProbeSettingsV1 = {
  target: ProbeTargetV1;
  session: SessionSettingsV1;
  kernel: StatusKernelSettingsV1;
  perfdata: boolean; // False drops the performance-data half of the output line.
  verbosity: number; // Count of -v flags; the app maps it to a log level.
};
