// backend/services/shared/src/middleware/requestId.ts
/**
 * Why:
 * The requestId is the correlation key that ties together access logs
 * (pino-http), security denials and problem+json `instance` fields.
 *
 * - If the caller supplied one (via common headers), we propagate it.
 * - If missing, we mint a UUIDv4.
 * - Attach to `req.id` and echo on the response header.
 *
 * Runs first; never overwrites an existing value.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    if (req.id == null) {
      const hdr =
        req.headers["x-request-id"] ||
        req.headers["x-correlation-id"] ||
        req.headers["x-amzn-trace-id"];
      req.id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();
    }
    res.setHeader("x-request-id", String(req.id));
    next();
  };
}
