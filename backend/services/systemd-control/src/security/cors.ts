// backend/services/systemd-control/src/security/cors.ts

/**
 * Browser origins derived from the same security config the gate enforces.
 * Not an enforcement point: the gate still admits or denies every request.
 *
 * - nothing configured → ["*"]
 * - key only           → [] (no browser access)
 * - allowlist          → http/https origin per non-CIDR entry; CIDR entries
 *                        can't be written as origins and contribute nothing
 */

import type { CorsOptions } from "cors";
import type { SecurityConfig } from "../config";

const METHODS = ["GET", "POST", "OPTIONS"];
const HEADERS = ["Authorization", "Content-Type"];

export function corsOrigins(cfg: SecurityConfig): string[] {
  const hasKey = !!cfg.apiKey;
  const hasHosts = cfg.allowedHosts.length > 0;

  if (!hasKey && !hasHosts) return ["*"];
  if (!hasHosts) return [];

  const origins: string[] = [];
  for (const host of cfg.allowedHosts) {
    if (host.toLowerCase() === "localhost") {
      origins.push("http://localhost", "https://localhost");
    } else if (!host.includes("/")) {
      origins.push(`http://${host}`, `https://${host}`);
    }
  }
  return origins;
}

/** `cors` options for a derived origin list. */
export function corsOptionsFor(origins: readonly string[]): CorsOptions {
  if (origins.length === 0) return { origin: false };

  const wildcard = origins.length === 1 && origins[0] === "*";
  return {
    origin: wildcard ? "*" : [...origins],
    credentials: !wildcard,
    methods: METHODS,
    allowedHeaders: HEADERS,
  };
}
