// src/logger/logger.ts
/**
 * Purpose:
 * - Root pino logger for the package; components log through a child bound
 *   with { component }.
 *
 * Notes:
 * - Level comes from LOG_LEVEL at load time (default "info"). An unknown
 *   level fails fast, matching how services treat LOG_LEVEL.
 */

import pino, {
  stdTimeFunctions,
  type LevelWithSilent,
  type Logger,
} from "pino";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

const validLevels: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LevelWithSilent {
  return validLevels.has(value);
}

function levelFromEnv(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

export const logger: Logger = pino({
  level: levelFromEnv(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["headers.authorization", "headers.cookie"],
  },
});

export function componentLogger(
  component: string,
  parent: Logger = logger
): Logger {
  return parent.child({ component });
}
