// backend/services/systemd-control/src/middleware/runtimeScope.ts

/**
 * Reads the holder exactly once per request. Everything downstream (CORS,
 * gate, handlers) uses `req.runtime`, so a reload mid-request can't split a
 * request across two configs.
 *
 * Order: mount right after requestId/httpLogger, before cors.
 */

import type { Request, RequestHandler } from "express";
import type { AppRuntime, RuntimeHolder } from "../runtime/RuntimeHolder";

export function runtimeScope(holder: RuntimeHolder): RequestHandler {
  return (req, _res, next) => {
    req.runtime = holder.get();
    next();
  };
}

export function runtimeOf(req: Request): AppRuntime {
  if (!req.runtime) throw new Error("runtimeScope() is not mounted");
  return req.runtime;
}
