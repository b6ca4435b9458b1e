/**
 * Pino logger for the service.
 *
 * NDJSON on stdout; the level comes from LOG_LEVEL.
 */
import { pino, type LevelWithSilent, type Logger } from "pino";

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    base: { service: "graphql-user-service", pid: process.pid },
  });
}
