// backend/services/systemd-control/src/security/SecurityPolicy.ts

/**
 * Why:
 * - One decision point for every gated route: API key AND/OR host allowlist.
 * - AND over the configured methods only. With nothing configured the policy
 *   grants everything (reverse-proxy mode; upstream enforces).
 *
 * Classification:
 * - key configured and failed → "unauthorized" (401), whatever the host says
 * - otherwise                 → "forbidden" (403)
 *
 * Notes:
 * - Pure: no Express, no env, no logging. The gate middleware logs denials.
 * - Token compare is constant-time over SHA-256 digests, so length differences
 *   don't short-circuit.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { SecurityConfig } from "../config";
import { matches } from "./allowlist";

export type DenialKind = "unauthorized" | "forbidden";

export type AccessDecision =
  | Readonly<{ granted: true; reasons: readonly string[] }>
  | Readonly<{ granted: false; reasons: readonly string[]; kind: DenialKind }>;

export const REASON_NO_SECURITY = "no security configured";
export const REASON_BAD_KEY = "invalid or missing API key";
export const reasonHostNotAllowed = (ip: string) =>
  `host ${ip} not in allowed list`;

function digest(s: string): Buffer {
  return createHash("sha256").update(s, "utf8").digest();
}

function tokenEquals(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

export class SecurityPolicy {
  public constructor(private readonly cfg: SecurityConfig) {}

  public get hasApiKey(): boolean {
    return !!this.cfg.apiKey;
  }

  public get hasHostRestriction(): boolean {
    return this.cfg.allowedHosts.length > 0;
  }

  /** Human-readable mode for startup logs. */
  public describe(): string {
    const parts: string[] = [];
    if (this.hasApiKey) parts.push("API key");
    if (this.hasHostRestriction) {
      parts.push(`host allowlist (${this.cfg.allowedHosts.length} hosts)`);
    }
    return parts.length ? parts.join(" + ") : "NONE (reverse proxy mode)";
  }

  public evaluate(clientIp: string, bearerToken?: string): AccessDecision {
    const { apiKey, allowedHosts } = this.cfg;

    if (!apiKey && allowedHosts.length === 0) {
      return { granted: true, reasons: [REASON_NO_SECURITY] };
    }

    const apiKeyOk =
      !!apiKey && bearerToken !== undefined && tokenEquals(bearerToken, apiKey);
    const hostOk = allowedHosts.length > 0 && matches(clientIp, allowedHosts);

    const reasons: string[] = [];
    if (apiKey && !apiKeyOk) reasons.push(REASON_BAD_KEY);
    if (allowedHosts.length > 0 && !hostOk) {
      reasons.push(reasonHostNotAllowed(clientIp));
    }

    if (reasons.length === 0) return { granted: true, reasons };

    return {
      granted: false,
      reasons,
      kind: apiKey && !apiKeyOk ? "unauthorized" : "forbidden",
    };
  }
}

/** Wire detail for a denial: "Access denied: <reasons>". */
export function denialDetail(reasons: readonly string[]): string {
  return `Access denied: ${reasons.join(", ")}`;
}
