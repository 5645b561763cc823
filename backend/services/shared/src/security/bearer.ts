// backend/services/shared/src/security/bearer.ts

/**
 * Extract the token from `Authorization: Bearer <token>`.
 * - Scheme match is case-insensitive.
 * - Any other scheme (Basic, raw token) yields undefined.
 */
export function extractBearerToken(
  header: string | string[] | undefined
): string | undefined {
  const raw = Array.isArray(header) ? header[0] : header;
  if (typeof raw !== "string") return undefined;
  const m = /^bearer\s+(.+)$/i.exec(raw.trim());
  if (!m) return undefined;
  const token = m[1].trim();
  return token === "" ? undefined : token;
}
