#!/usr/bin/env -S node --import tsx
import process from "node:process"; // Node process for argv, env and exit codes.

import { validateProbeOptionsV1 } from "@upsmon/options-validator";

import { PROBE_USAGE, PROBE_VERSION, parseProbeArgsV1 } from "./cli/args";
import { createProbeLogger } from "./logger";
import { renderPluginOutputV1, renderUnknownLineV1 } from "./output/plugin_output";
import { runProbeV1 } from "./probe";
import { SnmpValueSourceV1 } from "./transport/snmp_session";

async function main(): Promise<number> {
  const command = parseProbeArgsV1(process.argv.slice(2), process.env);
  if (command.kind === "help") {
    process.stdout.write(PROBE_USAGE);
    return 0;
  }
  if (command.kind === "version") {
    process.stdout.write(`ups-mib-probe ${PROBE_VERSION}\n`);
    return 0;
  }

  const settings = validateProbeOptionsV1(command.options);
  const logger = createProbeLogger(settings.verbosity);
  logger.info({ host: settings.target.host, port: settings.target.port }, "probe start");

  const source = new SnmpValueSourceV1(settings.target, settings.session, logger);
  const verdict = await runProbeV1(settings, source, logger);
  const out = renderPluginOutputV1(verdict, { perfdata: settings.perfdata });
  process.stdout.write(`${out.text}\n`);
  return out.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const out = renderUnknownLineV1(err instanceof Error ? err.message : String(err));
    process.stdout.write(`${out.text}\n`);
    process.exitCode = out.exitCode; // UNKNOWN for anything that escaped the probe.
  });
