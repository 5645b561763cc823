// backend/services/systemd-control/index.ts

/**
 * Why:
 * - Keep start-up boring: load env (bootstrap), init logs, validate config,
 *   pick the backend once, then start HTTP with shared startHttpService.
 * - SIGHUP reloads config in place; SIGINT/SIGTERM close the listener and the
 *   bus connection.
 */

import "./src/bootstrap"; // loads the optional env file
import "./src/log.init";

import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { SERVICE_NAME, loadServiceEnv } from "./src/bootstrap";
import { ConfigInvalidError, loadConfig } from "./src/config";
import { createApp } from "./src/app";
import { RuntimeHolder, buildRuntime } from "./src/runtime/RuntimeHolder";
import { reloadRuntime } from "./src/runtime/reload";
import { selectController } from "./src/systemd/selectController";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});

async function start(): Promise<void> {
  const config = loadConfig(process.env);
  const controller = selectController(config.backend);
  const holder = new RuntimeHolder(buildRuntime(config, controller));
  const { policy } = holder.get();

  logger.info(
    {
      port: config.port,
      backend: controller.backend,
      services: config.services.map((s) => `${s.displayName} (${s.service})`),
      allowedHosts: config.security.allowedHosts,
    },
    `Starting on port ${config.port}, monitoring ${config.services.length} services, security: ${policy.describe()}`
  );

  const started = await startHttpService({
    app: createApp(holder),
    port: config.port,
    host: config.host,
    serviceName: SERVICE_NAME,
    logger,
  });

  process.on("SIGHUP", () => {
    logger.info("SIGHUP received; reloading configuration");
    reloadRuntime(holder, controller, {
      refresh: () => {
        loadServiceEnv({ override: true });
      },
    });
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    setTimeout(() => process.exit(1), 10_000).unref();
    started
      .stop()
      .then(() => {
        controller.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, "error while closing listener");
        process.exit(1);
      });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

start().catch((err: unknown) => {
  if (err instanceof ConfigInvalidError) {
    logger.fatal({ variable: err.variable }, err.message);
  } else {
    logger.fatal({ err }, `failed to start ${SERVICE_NAME}`);
  }
  process.exit(1);
});
