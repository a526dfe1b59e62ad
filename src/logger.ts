/**
 * Structured logger.
 *
 * JSON output through pino. The level comes from LOG_LEVEL and defaults to
 * "warn", so a library consumer sees nothing unless they opt in.
 *
 * Usage:
 *   const log = createLogger("market");
 *   log.debug({ baseAmount: "10" }, "swap settled");
 */

import pino, { type Logger } from "pino";

export type { Logger };

const DEFAULT_LEVEL = "warn";

function getLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel && (envLevel === "silent" || envLevel in pino.levels.values)) {
    return envLevel;
  }
  return DEFAULT_LEVEL;
}

export const baseLogger: Logger = pino({
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger tagged with the calling module */
export function createLogger(service: string): Logger {
  return baseLogger.child({ service });
}

/** bigint fields rendered as decimal strings (JSON has no bigint) */
export function amounts(fields: Record<string, bigint>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value.toString();
  }
  return out;
}
