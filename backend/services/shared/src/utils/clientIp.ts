// backend/services/shared/src/utils/clientIp.ts
import { isIPv4 } from "node:net";

const V4_MAPPED = /^::ffff:/i;

/** The part of a request peer lookup reads; an Express Request fits. */
export type PeerSource = { socket?: { remoteAddress?: string } };

/**
 * Strip the IPv4-mapped prefix dual-stack sockets put on IPv4 peers
 * ("::ffff:10.0.0.5" → "10.0.0.5"). Anything else is returned unchanged.
 */
export function normalizePeerAddress(addr: string): string {
  if (!V4_MAPPED.test(addr)) return addr;
  const tail = addr.replace(V4_MAPPED, "");
  return isIPv4(tail) ? tail : addr;
}

/**
 * Returns the observed socket peer address, or undefined when the socket
 * has none (already destroyed).
 *
 * X-Forwarded-For is deliberately NOT consulted: a caller can set it to
 * anything. Deployments behind a proxy run without an allowlist here.
 */
export function getPeerAddress(req: PeerSource): string | undefined {
  const raw = req.socket?.remoteAddress;
  if (typeof raw !== "string" || raw === "") return undefined;
  return normalizePeerAddress(raw);
}

export const UNKNOWN_PEER = "unknown";

/** Peer address for policy checks and logs; "unknown" when there is none. */
export function clientIdentity(req: PeerSource): string {
  return getPeerAddress(req) ?? UNKNOWN_PEER;
}
