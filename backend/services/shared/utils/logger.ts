// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared process logger.
 *
 * Each service calls `initLogger(SERVICE_NAME)` at bootstrap, before any
 * request logger is built, so every record carries { service }.
 */

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function levelFromEnv(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

function baseOptions(): LoggerOptions {
  return {
    level: levelFromEnv(),
    base: {}, // no "service" until initLogger() runs
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  };
}

let SERVICE_NAME = "";

export let logger: Logger = pino(baseOptions());

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): Logger {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...baseOptions(), base: { service: SERVICE_NAME } });
  return logger;
}

export function extractLogContext(req: Request): Record<string, unknown> {
  return {
    requestId: req.id !== undefined ? String(req.id) : null,
    path: req.originalUrl,
    method: req.method,
    userId: req.user?.uid ?? null,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
