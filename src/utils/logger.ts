import winston from "winston";
import type { LogLevel } from "../types";

export type { LogLevel };

export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "verbose",
  "debug",
  "silly",
];

type LogMeta = Record<string, unknown>;

let logger: winston.Logger | null = null;
let level: LogLevel = "info";

function createLogger(): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${String(timestamp)}] [DeliveryClient] [${level.toUpperCase()}]`;
        if (stack) {
          return `${prefix} ${String(message)}\n${String(stack)}`;
        }
        return `${prefix} ${String(message)}`;
      })
    ),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

export function setLogLevel(next: LogLevel): void {
  level = next;
  if (logger) logger.level = next;
}

export const log = {
  error: (message: string, meta?: LogMeta) => getLogger().error(message, meta),
  warn: (message: string, meta?: LogMeta) => getLogger().warn(message, meta),
  info: (message: string, meta?: LogMeta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: LogMeta) => getLogger().verbose(message, meta),
  debug: (message: string, meta?: LogMeta) => getLogger().debug(message, meta),
  silly: (message: string, meta?: LogMeta) => getLogger().silly(message, meta),
};

export function resetLogger(): void {
  logger = null;
  level = "info";
}
