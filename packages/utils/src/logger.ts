import winston from "winston";
import { isDevelopment, isTest } from "@intentcam/config/node";

export type Logger = winston.Logger;

/**
 * Create a logger instance with consistent formatting.
 * Level comes from LOG_LEVEL, falling back to debug in development.
 */
export function createLogger(service: string): Logger {
  const format = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json(),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(
      ({ level, message, timestamp, service: name, ...metadata }) => {
        let msg = `${String(timestamp)} [${String(name)}] ${level}: ${String(message)}`;
        if (Object.keys(metadata).length > 0) {
          msg += ` ${JSON.stringify(metadata)}`;
        }
        return msg;
      },
    ),
  );

  const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || (isDevelopment() ? "debug" : "info"),
    format,
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
    ],
  });

  // File transports outside development
  if (!isDevelopment() && !isTest()) {
    logger.add(
      new winston.transports.File({
        filename: "logs/error.log",
        level: "error",
      }),
    );
    logger.add(
      new winston.transports.File({
        filename: "logs/combined.log",
      }),
    );
  }

  return logger;
}

/**
 * Default logger instance
 */
export const logger = createLogger("intentcam");
