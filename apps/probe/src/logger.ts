import pino, { type Level, type Logger } from "pino"; // pino: same logger Fastify's `logger: true` sets up.

export type ProbeLogger = Logger;

export function logLevelForVerbosity(verbosity: number): Level {
  if (verbosity <= 0) return "warn";
  if (verbosity === 1) return "info";
  if (verbosity === 2) return "debug";
  return "trace";
}

/**
 * stdout carries the single plugin line; diagnostics go to stderr, written synchronously
 * so nothing is lost when the process exits right after the verdict.
 */
export function createProbeLogger(verbosity: number): ProbeLogger {
  return pino(
    { name: "ups-mib-probe", level: logLevelForVerbosity(verbosity) },
    pino.destination({ dest: 2, sync: true })
  );
}

export function createSilentLogger(): ProbeLogger {
  return pino({ level: "silent" });
}
