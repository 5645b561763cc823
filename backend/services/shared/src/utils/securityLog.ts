// backend/services/shared/src/utils/securityLog.ts

/**
 * Why:
 * - Guardrail denials belong to SECURITY telemetry, separate from access logs.
 * - Never log credentials; callers pass reasons, not tokens.
 */
import type { Request } from "express";
import { logger } from "./logger";

type SecurityKind = "auth_failed" | "forbidden";

export interface SecurityEvent {
  kind: SecurityKind;
  reason: string;
  decision: "blocked" | "allowed";
  status?: number;
  ip?: string;
  details?: Record<string, unknown>;
}

export function logSecurity(req: Request, ev: SecurityEvent) {
  // Child is taken per call: `logger` is replaced by initLogger().
  logger.child({ channel: "security" }).warn(
    {
      ...ev,
      requestId: req.id == null ? undefined : String(req.id),
      method: req.method,
      path: req.originalUrl || req.url,
    },
    "[SECURITY] %s %s → %s (%s)",
    req.method,
    req.originalUrl || req.url,
    ev.decision,
    ev.reason
  );
}
