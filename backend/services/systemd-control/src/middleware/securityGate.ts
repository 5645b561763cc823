// backend/services/systemd-control/src/middleware/securityGate.ts

/**
 * Security gate for every non-health route.
 *
 * Why:
 * - The policy is pure; this is where it meets HTTP. Client identity is the
 *   socket peer (X-Forwarded-For ignored), the token comes from
 *   `Authorization: Bearer`.
 * - Denials become problem+json 401 (with WWW-Authenticate) or 403, and are
 *   logged on the SECURITY channel with ip and reasons. Never the token.
 */

import type { RequestHandler } from "express";
import { extractBearerToken } from "@shared/security/bearer";
import { clientIdentity } from "@shared/utils/clientIp";
import { logSecurity } from "@shared/utils/securityLog";
import { ForbiddenError, UnauthorizedError } from "@shared/problem/problem";
import { denialDetail } from "../security/SecurityPolicy";
import { runtimeOf } from "./runtimeScope";

export function securityGate(): RequestHandler {
  return (req, _res, next) => {
    const { policy } = runtimeOf(req);
    const ip = clientIdentity(req);
    const decision = policy.evaluate(ip, extractBearerToken(req.headers.authorization));

    if (decision.granted) return next();

    const unauthorized = decision.kind === "unauthorized";
    logSecurity(req, {
      kind: unauthorized ? "auth_failed" : "forbidden",
      reason: decision.reasons.join(", "),
      decision: "blocked",
      status: unauthorized ? 401 : 403,
      ip,
    });

    const detail = denialDetail(decision.reasons);
    next(unauthorized ? new UnauthorizedError(detail) : new ForbiddenError(detail));
  };
}
