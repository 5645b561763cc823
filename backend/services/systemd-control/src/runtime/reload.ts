// backend/services/systemd-control/src/runtime/reload.ts

/**
 * SIGHUP reload: re-read the env file, re-validate, swap the runtime.
 *
 * Notes:
 * - Invalid config keeps the running runtime and logs why.
 * - Listener address and backend are fixed at startup; a changed value is
 *   logged and ignored until restart.
 * - Variables removed from the env file keep their boot values (dotenv only
 *   sets, never unsets).
 */

import { logger, setLogLevel } from "@shared/utils/logger";
import { loadConfig } from "../config";
import type { ServiceController } from "../systemd/ServiceController";
import { buildRuntime, type RuntimeHolder } from "./RuntimeHolder";

export type ReloadDeps = {
  env?: NodeJS.ProcessEnv;
  /** Refresh `env` from its source before validating. */
  refresh?: () => void;
};

export function reloadRuntime(
  holder: RuntimeHolder,
  controller: ServiceController,
  deps: ReloadDeps = {}
): boolean {
  const prev = holder.get().config;
  try {
    deps.refresh?.();
    const config = loadConfig(deps.env ?? process.env);
    const next = buildRuntime(config, controller);

    if (config.port !== prev.port || config.host !== prev.host) {
      logger.warn(
        { host: config.host, port: config.port },
        "listen address changed; restart to apply"
      );
    }
    if (config.backend !== prev.backend) {
      logger.warn({ backend: config.backend }, "backend changed; restart to apply");
    }

    holder.replace(next);
    setLogLevel(config.logLevel);
    logger.info(
      { services: config.services.length, security: next.policy.describe() },
      "configuration reloaded"
    );
    return true;
  } catch (err) {
    logger.error(
      { err: err instanceof Error ? err.message : String(err) },
      "configuration reload rejected; keeping current runtime"
    );
    return false;
  }
}
