/**
 * schemagraph — Logging
 *
 * One pino root logger for the process, writing JSON lines to stderr so CLI
 * output on stdout stays machine-readable. Modules ask for a component child
 * logger at call time, so `setLogger` takes effect everywhere.
 */

import { destination, pino, type LevelWithSilent, type Logger } from "pino";

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(value: unknown): value is LevelWithSilent {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LevelWithSilent {
  const fromEnv = process.env.SCHEMAGRAPH_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.VITEST ? "silent" : "info";
}

export function createLogger(name = "schemagraph", opts: { level?: LevelWithSilent } = {}): Logger {
  return pino({ name, level: opts.level ?? defaultLevel() }, destination(2));
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

export function getComponentLogger(component: string): Logger {
  return getLogger().child({ component });
}
