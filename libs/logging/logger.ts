import { pino } from "pino";
import { z } from "zod";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export const LogLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Level for the root logger. Blank or unknown values fall back to the default;
 * loadEngineConfig() is where a bad value is reported as a config violation.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: {
    system: "polycipher"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

const requestedLevel = process.env.LOG_LEVEL?.trim();
if (requestedLevel && requestedLevel !== logger.level) {
  logger.warn({ logLevel: requestedLevel }, "Unknown LOG_LEVEL, using default");
}

/**
 * Returns a child logger tagged with the component name.
 */
export function getComponentLogger(component: string) {
  return logger.child({ component });
}
