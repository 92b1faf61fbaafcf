import pino, { type Logger } from "pino";

/**
 * Create a named pino logger for a service or module.
 *
 * Output is JSON with ISO timestamps and a string `level` label. The level
 * comes from the LOG_LEVEL environment variable and defaults to "info".
 *
 * Usage:
 *   const logger = createLogger("shard-router");
 *   logger.info({ shards: 4 }, "Router ready");
 *   logger.error({ err }, "Replica write failed");
 *
 * @param serviceName - Name bound to every line as `name`.
 * @param bindings - Extra fields bound to every line (e.g. `{ machineId }`).
 */
export function createLogger(
  serviceName: string,
  bindings: Record<string, unknown> = {},
): Logger {
  const logger = pino({
    name: serviceName,
    level: process.env["LOG_LEVEL"] ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  });

  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}
