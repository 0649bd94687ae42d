import pino from "pino";

/**
 * Creates the single logger `main` hands to every component: the store,
 * fetcher, notifier, bot handlers and scheduler all log through it. Lines
 * are JSON on stdout with a string `level` and an ISO `time`.
 * `LOG_LEVEL=debug` also shows skipped ticks.
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
