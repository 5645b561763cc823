// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Why:
 * - Consistent, structured request logs that correlate with security and
 *   error logs by `reqId`.
 * - Telemetry only. Never blocks requests and is not the SECURITY channel.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is already set.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health and favicon requests are not logged.
 * - The root logger already carries `service` once initLogger() has run;
 *   `component` tells access lines apart from application lines.
 * - The access logger outlives config reloads, so it follows the root level.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { followRootLevel, logger as rootLogger } from "../utils/logger";

const QUIET_URLS = new Set(["/health", "/healthz", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ component: "http" });

  const httpLogger = pinoHttp({
    logger,

    // Reuse req.id from requestIdMiddleware; mint only if it is missing.
    genReqId: (req, res) => {
      const existing = req.id;
      if (existing != null) return existing;
      const id = randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      reqId: req.id,
      ...(rootLogger.bindings().service ? {} : { service: serviceName }),
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_URLS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
  followRootLevel(httpLogger.logger);
  return httpLogger;
}
