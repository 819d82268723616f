import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

/**
 * Create the pino logger a telemetry component reports its own diagnostics
 * through (start/stop, retries, freeze alerts). The durable per-run streams
 * are written by the log router, not by these loggers.
 *
 *   const logger = createLogger("freeze-detector");
 *   logger.warn({ component }, "Watchdog timed out");
 *   logger.error({ err }, "Freeze callback failed");
 *
 * Level comes from LOG_LEVEL (default "info"). Extra bindings are attached
 * to every line the logger writes.
 */
export function createLogger(
  serviceName: string,
  bindings: Record<string, unknown> = {},
): Logger {
  const options: LoggerOptions = {
    name: serviceName,
    level: process.env["LOG_LEVEL"] ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };

  const logger = pino(options);
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}
