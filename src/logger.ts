import pino from "pino";

/**
 * Creates the structured JSON logger shared by the service, the scheduler and the CLI.
 *
 * - Level label as a string, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaults to `info`
 * - Credentials that end up in logged request context are redacted
 *
 * The logger is handed to every stage explicitly; nothing in the pipeline
 * reaches for a module-level instance.
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "release-herald",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    redact: {
      paths: ["token", "webhookUrl", "headers.Authorization"],
      censor: "[redacted]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
