// backend/services/shared/src/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared logger (authoritative).
 *
 * Each service calls `initLogger(SERVICE_NAME)` at bootstrap, before any
 * request logger (pino-http) is created, so every line carries `service`.
 *
 * Env:
 * - LOG_LEVEL (optional) fatal|error|warn|info|debug|trace|silent [default: info]
 */

const validLevels: ReadonlySet<string> = new Set([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function envLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

const pinoOptions: LoggerOptions = {
  level: envLevel(),
  base: {}, // no "service" until initLogger() runs
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  const service = String(serviceName || "").trim();
  if (!service) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service } });
}

/** Child logger scoped to a component; always resolves the current root. */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

/** Normalize an unknown thrown value for structured logging. */
export function errFields(err: unknown): { err: Error } | { error: string } {
  return err instanceof Error ? { err } : { error: String(err) };
}
