// net-snmp backed value source: one session per probe run.

import type { ValueStoreV1 } from "@upsmon/contracts";
import type { SessionSettingsV1, SnmpV3SecurityV1, ProbeTargetV1 } from "@upsmon/options-validator";
import { ProbeDataError } from "@upsmon/status-kernel";
import snmp, { type Session, type User } from "net-snmp";

import type { ProbeLogger } from "../logger";
import type { UpsValueSourceV1 } from "./types";
import { varbindsToStoreV1 } from "./snmp_values";

const AUTH_PROTOCOLS = { md5: snmp.AuthProtocols.md5, sha: snmp.AuthProtocols.sha } as const;
const PRIV_PROTOCOLS = { des: snmp.PrivProtocols.des, aes: snmp.PrivProtocols.aes } as const;

function v3User(name: string, security: SnmpV3SecurityV1): User {
  switch (security.level) {
    case "noAuthNoPriv":
      return { name, level: snmp.SecurityLevel.noAuthNoPriv };
    case "authNoPriv":
      return {
        name,
        level: snmp.SecurityLevel.authNoPriv,
        authProtocol: AUTH_PROTOCOLS[security.authProtocol],
        authKey: security.authPassword
      };
    case "authPriv":
      return {
        name,
        level: snmp.SecurityLevel.authPriv,
        authProtocol: AUTH_PROTOCOLS[security.authProtocol],
        authKey: security.authPassword,
        privProtocol: PRIV_PROTOCOLS[security.privProtocol],
        privKey: security.privPassword
      };
  }
}

function openSession(target: ProbeTargetV1, settings: SessionSettingsV1): Session {
  const common = { port: target.port, timeout: settings.timeoutMs, retries: settings.retries };
  if (settings.version === "3") {
    return snmp.createV3Session(target.host, v3User(settings.username, settings.security), common);
  }
  return snmp.createSession(target.host, settings.community, {
    ...common,
    version: settings.version === "1" ? snmp.Version1 : snmp.Version2c
  });
}

export class SnmpValueSourceV1 implements UpsValueSourceV1 {
  private readonly session: Session;
  private readonly host: string;
  private readonly logger: ProbeLogger;
  private readonly pending = new Set<(err: ProbeDataError) => void>();
  private failure: ProbeDataError | undefined;

  constructor(target: ProbeTargetV1, settings: SessionSettingsV1, logger: ProbeLogger) {
    this.host = target.host;
    this.logger = logger;
    this.session = openSession(target, settings);
    // Undecodable datagrams surface here, not on the request callback.
    this.session.on("error", (err: Error) => this.fail(err));
    logger.debug({ host: target.host, port: target.port, version: settings.version }, "snmp session opened");
  }

  private fail(err: Error): void {
    const failure = new ProbeDataError("TRANSPORT_FAILURE", `${this.host}: ${err.message}`, { cause: err });
    this.logger.warn({ err }, "snmp session error");
    if (this.failure === undefined) this.failure = failure;
    for (const reject of this.pending) reject(failure);
    this.pending.clear();
  }

  fetch(oids: ReadonlyArray<string>): Promise<ValueStoreV1> {
    if (this.failure !== undefined) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.pending.add(reject);
      this.session.get([...oids], (error, varbinds) => {
        if (!this.pending.delete(reject)) return; // already failed by a session error
        if (error) {
          reject(new ProbeDataError("TRANSPORT_FAILURE", `${this.host}: ${error.message}`, { cause: error }));
          return;
        }
        const store = varbindsToStoreV1(varbinds ?? []);
        this.logger.trace({ requested: oids.length, received: store.size }, "snmp get");
        resolve(store);
      });
    });
  }

  close(): void {
    this.session.close();
  }
}
