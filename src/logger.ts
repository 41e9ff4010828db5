/**
 * Shared logger.
 *
 * Plain-text console output with a timestamp. Level comes from
 * RECKLESS_LOG_LEVEL; output is silenced under the test runner.
 */

import winston from "winston";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

export const logger = winston.createLogger({
  level: resolveLogLevel(process.env.RECKLESS_LOG_LEVEL),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => `${timestamp} ${level}: ${message}`),
  ),
  transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
});
