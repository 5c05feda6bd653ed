import pino from "pino";

/**
 * Creates a pino logger emitting structured JSON lines.
 *
 * - Level is written as its string label rather than the numeric value
 * - ISO 8601 timestamps
 * - Level configurable via `LOG_LEVEL` env var, defaults to `info`
 * - Writes to stdout unless a destination stream is given (the CLI uses stderr)
 *
 * @param level - Optional override for log level (defaults to LOG_LEVEL env var or "info")
 * @param destination - Optional stream to write log lines to
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
