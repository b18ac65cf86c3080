import winston from "winston";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// stdout carries codes and URIs, so every log line goes to stderr.
const rootLogger = winston.createLogger({
  level: "warn",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "onetime" },
  transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
});

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

export function getLogLevel(): string {
  return rootLogger.level;
}

/** Logger tagged with a `subsystem` field. Never pass secrets or generated codes. */
export function getChildLogger(subsystem: string): winston.Logger {
  return rootLogger.child({ subsystem });
}
