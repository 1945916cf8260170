import pino from "pino";

/**
 * Creates the service logger: structured JSON on stdout.
 *
 * - Level labels as strings, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaults to `info`
 * - Session tokens and passwords are redacted wherever they appear in a log object
 *
 * @param level - Optional override for log level (defaults to LOG_LEVEL env var or "info")
 * @param destination - Optional stream to write to instead of stdout
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
    redact: {
      paths: ["password", "accessJwt", "refreshJwt", "*.password", "*.accessJwt", "*.refreshJwt"],
      censor: "[redacted]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
