import pino from "pino";

const isDevelopment = process.env.NODE_ENV !== "production";

function resolveLogLevel(): string {
  const value = process.env.DOCKWATCH_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (!value) return isDevelopment ? "debug" : "info";
  const normalized = value.toLowerCase();
  if (
    ["trace", "debug", "info", "warn", "error", "fatal", "silent"].includes(
      normalized,
    )
  )
    return normalized;
  return isDevelopment ? "debug" : "info";
}

/**
 * Root pino logger instance.
 * - JSON output in production for log aggregators.
 * - Pretty-printed, colorized output in development.
 * - Silent under Vitest unless a level is set explicitly.
 */
export const rootLogger = pino({
  level: process.env.VITEST && !process.env.LOG_LEVEL
    ? "silent"
    : resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "password",
      "token",
      "secret",
      "authorization",
      "registryAuth",
      "req.headers.authorization",
      "req.headers.cookie",
    ],
    censor: "[REDACTED]",
  },
  transport:
    isDevelopment && !process.env.VITEST
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "HH:MM:ss.l",
          },
        }
      : undefined,
});

/**
 * Create a scoped child logger.
 * All log entries include the scope field for filtering.
 *
 * Usage:
 *   const logger = createLogger("hub");
 *   logger.info({ cid, resource }, "resource created");
 */
export function createLogger(scope: string): pino.Logger {
  return rootLogger.child({ scope });
}
