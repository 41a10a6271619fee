/**
 * Collateral Engine - Logger
 *
 * One winston logger per component, one line per entry:
 *   <timestamp> [LEVEL] [COMPONENT] message
 */

import { createLogger, format, transports, Logger } from "winston";

export function createComponentLogger(component: string, level?: string): Logger {
  return createLogger({
    level: level || process.env.LOG_LEVEL || "info",
    silent: process.env.NODE_ENV === "test",
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) =>
          `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`
      )
    ),
    transports: [new transports.Console()],
  });
}

export type { Logger };
