import pino from "pino";

const isTest = process.env.VITEST !== undefined;
const pretty = process.env.NODE_ENV !== "production" && !isTest;

// Tokens and the admin password must never reach the log sink.
const REDACT_PATHS = ["token", "password", "*.token", "*.password", "headers.authorization"];

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  base: { service: "hunt-coordinator" },
  redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:HH:MM:ss", ignore: "pid,hostname,service" },
      }
    : undefined,
});

/**
 * Child logger tagged with the component that owns it.
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
