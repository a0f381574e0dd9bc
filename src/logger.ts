import pino from "pino";

const DEBUG_VALUES = new Set(["1", "true", "yes"]);

/**
 * Whether verbose pipeline logging was requested through `PRESS_DEBUG`.
 */
export function isDebugEnabled(
  value: string | undefined = process.env["PRESS_DEBUG"],
): boolean {
  return DEBUG_VALUES.has((value ?? "").toLowerCase());
}

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps for structured log aggregation
 * - Level resolution: explicit argument, then `LOG_LEVEL`, then `debug` when
 *   `PRESS_DEBUG` is set, otherwise `info`
 *
 * @param level - Optional override for log level
 * @param destination - Where JSON lines go; stdout when omitted
 * @returns Configured pino Logger instance
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level:
      level ??
      process.env["LOG_LEVEL"] ??
      (isDebugEnabled() ? "debug" : "info"),
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
