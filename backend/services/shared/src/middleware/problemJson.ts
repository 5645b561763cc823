// backend/services/shared/src/middleware/problemJson.ts
/**
 * References:
 * - RFC 7807: Problem Details for HTTP APIs (application/problem+json)
 *
 * Why:
 * We standardize error responses using RFC 7807 so callers and tests can rely
 * on a predictable envelope. This file provides:
 *   1) `sendProblem(res, body)` so guards and handlers emit the same shape.
 *   2) A 404 tail handler with the same envelope.
 *   3) A global error handler that logs 5xx with a trimmed stack (to logs only)
 *      while returning a sanitized problem+json body to clients. Errors that
 *      carry a 4xx `status`/`statusCode` (Express param decoding, body
 *      parsers) keep that status and log at warn without a stack.
 *
 * Notes:
 * - Guardrail denials log via `logSecurity` themselves; nothing here does.
 */

import { STATUS_CODES } from "http";
import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { logger } from "../utils/logger";
import { HttpProblemError, type ProblemJson } from "../problem/problem";

function ridOf(req: Request): string | undefined {
  return req.id == null ? undefined : String(req.id);
}

function sendProblem(res: Response, body: ProblemJson): void {
  res.status(body.status);
  res.type("application/problem+json");
  res.json(body);
}

// 404 tail: same envelope, instance = request id
export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    sendProblem(res, {
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      instance: ridOf(req),
    });
  };
};

function trimStack(err: Error): string[] {
  return String(err.stack || "")
    .split("\n")
    .slice(0, 8);
}

function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const n = Number(Reflect.get(err, "status") ?? Reflect.get(err, "statusCode"));
  return Number.isInteger(n) && n >= 400 && n < 500 ? n : undefined;
}

// Global error handler: logs server faults, returns sanitized problem+json
export const errorHandler = (): ErrorRequestHandler => {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      // Can't shape a new response; let Express finalize.
      logger.debug(
        { rid: ridOf(req), method: req.method, url: req.originalUrl, err },
        "error after headers sent"
      );
      return next(err);
    }

    if (err instanceof HttpProblemError) {
      for (const [k, v] of Object.entries(err.headers)) res.setHeader(k, v);
      return sendProblem(res, err.toProblem(ridOf(req)));
    }

    const e = err instanceof Error ? err : new Error(String(err));

    const clientStatus = clientStatusOf(err);
    if (clientStatus !== undefined) {
      logger.warn(
        {
          rid: ridOf(req),
          method: req.method,
          url: req.originalUrl,
          status: clientStatus,
          name: e.name,
          message: e.message,
        },
        "client error"
      );
      return sendProblem(res, {
        type: "about:blank",
        title: STATUS_CODES[clientStatus] ?? "Client Error",
        status: clientStatus,
        detail: "Request could not be processed",
        instance: ridOf(req),
      });
    }

    logger.error(
      {
        rid: ridOf(req),
        method: req.method,
        url: req.originalUrl,
        name: e.name,
        message: e.message,
        stack: trimStack(e),
      },
      "unhandled error"
    );

    sendProblem(res, {
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "Unexpected error",
      instance: ridOf(req),
    });
  };
};
