// backend/services/systemd-control/src/security/allowlist.ts

/**
 * Allowlist matcher: is a client address admitted by any allowlist entry?
 *
 * Entries are classified per comparison, never stored classified:
 *   - "localhost" (any case) → 127.0.0.1, ::1 or the literal "localhost"
 *   - contains "/"           → CIDR, IPv4 or IPv6; prefix length or IPv4
 *                              dotted netmask/hostmask; host bits tolerated
 *   - parses as an IP        → single address
 *   - anything else          → opaque hostname, raw string equality
 *
 * Notes:
 * - Address families never cross: an IPv4 client cannot match an IPv6 entry,
 *   IPv4-mapped IPv6 included. Peers are normalized before they get here.
 * - A malformed CIDR entry matches only a client string equal to it.
 */

import { BlockList, isIP } from "node:net";

export type IpFamily = "ipv4" | "ipv6";

export type ParsedAddress = Readonly<{ address: string; family: IpFamily }>;

export type ParsedNetwork = Readonly<{
  network: string;
  prefix: number;
  family: IpFamily;
}>;

const LOCALHOST = "localhost";
const LOOPBACK: readonly ParsedAddress[] = [
  { address: "127.0.0.1", family: "ipv4" },
  { address: "::1", family: "ipv6" },
];

/** IPv4/IPv6 literal → parsed address. Zone-scoped IPv6 (`%eth0`) is not parsed. */
export function parseAddress(raw: string): ParsedAddress | undefined {
  const s = raw.trim();
  if (s.includes("%")) return undefined;
  switch (isIP(s)) {
    case 4:
      return { address: s, family: "ipv4" };
    case 6:
      return { address: s, family: "ipv6" };
    default:
      return undefined;
  }
}

function ipv4ToInt(s: string): number {
  return (
    s
      .split(".")
      .map(Number)
      .reduce((acc, octet) => acc * 256 + octet, 0) >>> 0
  );
}

/** Contiguous-ones mask → prefix length, or undefined when not contiguous. */
function maskToPrefix(mask: number): number | undefined {
  const inverted = ~mask >>> 0;
  // ones followed by zeros ⇔ inverted + 1 is a power of two
  if ((inverted & (inverted + 1)) !== 0) return undefined;
  return 32 - Math.log2(inverted + 1);
}

function ipv4MaskToPrefix(mask: string): number | undefined {
  const n = ipv4ToInt(mask);
  return maskToPrefix(n) ?? maskToPrefix(~n >>> 0);
}

/** "net/prefix" or "net/dotted-mask" → network; undefined when malformed. */
export function parseNetwork(raw: string): ParsedNetwork | undefined {
  const slash = raw.indexOf("/");
  if (slash < 0) return undefined;
  const base = parseAddress(raw.slice(0, slash));
  const suffix = raw.slice(slash + 1).trim();
  if (!base || !suffix) return undefined;

  const max = base.family === "ipv4" ? 32 : 128;
  let prefix: number | undefined;
  if (/^\d+$/.test(suffix)) {
    prefix = Number(suffix);
  } else if (base.family === "ipv4" && isIP(suffix) === 4) {
    prefix = ipv4MaskToPrefix(suffix);
  }
  if (prefix === undefined || prefix > max) return undefined;

  return { network: base.address, prefix, family: base.family };
}

function sameAddress(a: ParsedAddress, b: ParsedAddress): boolean {
  if (a.family !== b.family) return false;
  const list = new BlockList();
  list.addAddress(b.address, b.family);
  return list.check(a.address, a.family);
}

function inNetwork(addr: ParsedAddress, net: ParsedNetwork): boolean {
  if (addr.family !== net.family) return false;
  const list = new BlockList();
  list.addSubnet(net.network, net.prefix, net.family);
  return list.check(addr.address, addr.family);
}

function isLoopbackAlias(raw: string, addr: ParsedAddress): boolean {
  return raw === LOCALHOST || LOOPBACK.some((lo) => sameAddress(addr, lo));
}

function entryMatches(raw: string, addr: ParsedAddress, entry: string): boolean {
  if (entry.toLowerCase() === LOCALHOST) return isLoopbackAlias(raw, addr);

  if (entry.includes("/")) {
    const net = parseNetwork(entry);
    return net ? inNetwork(addr, net) : entry === raw;
  }

  const single = parseAddress(entry);
  return single ? sameAddress(addr, single) : entry === raw;
}

/** True when `clientIp` is admitted by any entry. Empty list never matches. */
export function matches(
  clientIp: string,
  allowedHosts: readonly string[]
): boolean {
  const addr = parseAddress(clientIp);
  if (!addr) return allowedHosts.some((entry) => entry === clientIp);
  return allowedHosts.some((entry) => entryMatches(clientIp, addr, entry));
}
