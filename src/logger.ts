import pino from "pino";

/**
 * Creates the service logger: JSON to stdout, string level labels,
 * ISO 8601 timestamps. Level comes from `LOG_LEVEL` unless overridden.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "feed-relay",
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
