import pino from "pino";
import type { Logger } from "pino";
import { type ScanStatsSettings, loadSettings } from "../config/settings.js";

export type { Logger } from "pino";

/**
 * Root logger. Logs go to stderr so stdout stays free for the report summary.
 */
export function createLogger(
  settings: Pick<ScanStatsSettings, "logLevel" | "logPretty"> = loadSettings(),
): Logger {
  const options: pino.LoggerOptions = {
    name: "scan-stats",
    level: settings.logLevel,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (settings.logPretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
