// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Why:
 * - Starting/stopping an HTTP server is a single concern: bind, harden
 *   socket timeouts, log where it landed (port 0 in tests), close cleanly.
 * - Callers own env loading, logger init and signal handling.
 *
 * Notes:
 * - Resolves once listening; rejects if the bind fails (EADDRINUSE etc.).
 * - headersTimeout stays above keepAliveTimeout.
 */

import type { Server } from "node:http";
import type { Express } from "express";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** 0 picks an ephemeral port. */
  port: number;
  host: string;
  serviceName: string;
  logger: Logger;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, host, serviceName, logger } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.keepAliveTimeout = 7_000;
    server.headersTimeout = 9_000;

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      server.on("error", (err) => {
        logger.error({ err, service: serviceName }, "http server error");
      });

      const addr = server.address();
      const boundPort = typeof addr === "object" && addr ? addr.port : port;
      logger.info({ service: serviceName, host, port: boundPort }, "service listening");

      const stop = () =>
        new Promise<void>((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        });
      resolve({ server, boundPort, stop });
    });
  });
}
