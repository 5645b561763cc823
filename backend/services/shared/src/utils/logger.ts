// backend/services/shared/src/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * ❗️Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap
 *    BEFORE creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
 *
 * `logger` is a live binding: modules that import it see the instance
 * created by initLogger(), so take children lazily, not at import time.
 */

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return LEVELS.some((l) => l === v);
}

function levelFromEnv(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim();
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// NOTE: Start with NO base.service; initLogger() recreates with it set.
const pinoOptions: LoggerOptions = {
  level: levelFromEnv(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string, level?: LevelWithSilent): void {
  const service = serviceName.trim();
  if (!service) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: level ?? pinoOptions.level,
    base: { service },
  });
}

// Long-lived children keep the level they were created with unless told.
const followers = new Set<Logger>();

/** Keep `child` at the root level across setLogLevel() calls. */
export function followRootLevel(child: Logger): void {
  child.level = logger.level;
  followers.add(child);
}

/** Set level dynamically (config reload, tests). */
export function setLogLevel(level: LevelWithSilent) {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  logger.level = level;
  for (const child of followers) child.level = level;
}
