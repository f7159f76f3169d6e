import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
}

// Logs go to stderr; stdout is reserved for the command's JSON result.
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? process.env.PKGSYNC_LOG_LEVEL ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    },
    pino.destination(2),
  );
}
