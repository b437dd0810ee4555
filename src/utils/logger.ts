import winston from "winston";
import type { LogLevel } from "../types";

export type { LogLevel };

export type Logger = winston.Logger;

export function createLogger(level: LogLevel = "info"): Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
        const prefix = `[${String(timestamp)}] [ciphership] [${level.toUpperCase()}]`;
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        if (stack) {
          return `${prefix} ${String(message)}${extra}\n${String(stack)}`;
        }
        return `${prefix} ${String(message)}${extra}`;
      })
    ),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}

/** Logger that discards everything; handy for tests and embedding. */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
