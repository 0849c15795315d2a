import winston from "winston";
import type { Logger, LogLevel } from "@sessionsync/core";

export type CliLoggerOptions = {
  level?: LogLevel;
  service?: string;
  /** Defaults to a console transport writing to stderr, leaving stdout to reports. */
  transports?: winston.transport[];
};

/**
 * Structured JSON logger for the CLI and the watch process.
 */
export function createCliLogger(options: CliLoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: {
      service: options.service ?? "sessionsync",
    },
    transports: options.transports ?? [
      new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] }),
    ],
  });
}

/**
 * Narrows a winston logger to the core {@link Logger} contract.
 */
export function toCoreLogger(logger: winston.Logger): Logger {
  const write = (level: LogLevel) => (msg: string, meta?: unknown) => {
    if (meta === undefined) {
      logger.log(level, msg);
      return;
    }
    logger.log(level, msg, isRecord(meta) ? meta : { meta });
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
