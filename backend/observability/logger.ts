// observability/logger.ts
// Process-wide logger for the stats/plot job.

import winston from "winston";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && LEVELS.some((l) => l === v);
}

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack }) => {
  const body = typeof stack === "string" ? stack : String(message);
  return `${String(timestamp)} [${level}] ${body}`;
});

const initialLevel = process.env.LOG_LEVEL;

export const logger = winston.createLogger({
  level: isLogLevel(initialLevel) ? initialLevel : "info",
  format: combine(errors({ stack: true }), timestamp(), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }), logFormat),
    }),
  ],
});

/** Fixed once at start-up, before any band type is processed. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
