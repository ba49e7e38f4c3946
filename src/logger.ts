import pino from "pino";

/**
 * Creates the structured JSON logger shared by the sync engine, the API and
 * the scheduler.
 *
 * - Level labels instead of numbers, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaulting to `info`
 * - Every line carries `service: "feedkeeper"`; pipelines add `feedId`
 *   through child loggers
 *
 * @param level - Optional override for the log level
 * @param destination - Where lines go; stdout by default
 */
export function createLogger(level?: string, destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "feedkeeper" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
