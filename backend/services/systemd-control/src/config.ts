// backend/services/systemd-control/src/config.ts

/**
 * Why:
 * - Centralize env parsing with hard assertions. The result is a deep-frozen
 *   snapshot; reload builds a new one instead of editing fields.
 * - No dotenv loading here (bootstrap.ts loads the optional env file).
 *
 * Env:
 *   SYSTEMD_CONTROL_API_KEY               bearer token; unset/empty disables the check
 *   SYSTEMD_CONTROL_API_PORT              default 8080
 *   SYSTEMD_CONTROL_API_HOST              default 0.0.0.0
 *   SYSTEMD_CONTROL_API_SERVICES          JSON array of { service, displayName, description, metadata? }
 *   SYSTEMD_CONTROL_API_ALLOWED_HOSTS     comma-separated IPs, CIDRs, hostnames or "localhost"
 *   SYSTEMD_CONTROL_API_BACKEND           auto | dbus | systemctl (default auto)
 *   SYSTEMD_CONTROL_API_STATUS_TIMEOUT_MS default 5000
 *   SYSTEMD_CONTROL_API_ACTION_TIMEOUT_MS default 30000
 *   LOG_LEVEL                             default info
 */

import { z } from "zod";
import type { LevelWithSilent } from "pino";
import { optionalEnv } from "@shared/env";
import { isLogLevel } from "@shared/utils/logger";
import {
  zServiceRecordList,
  type ServiceRecord,
} from "./contracts/service.contract";

export const ENV = {
  apiKey: "SYSTEMD_CONTROL_API_KEY",
  port: "SYSTEMD_CONTROL_API_PORT",
  host: "SYSTEMD_CONTROL_API_HOST",
  services: "SYSTEMD_CONTROL_API_SERVICES",
  allowedHosts: "SYSTEMD_CONTROL_API_ALLOWED_HOSTS",
  backend: "SYSTEMD_CONTROL_API_BACKEND",
  statusTimeoutMs: "SYSTEMD_CONTROL_API_STATUS_TIMEOUT_MS",
  actionTimeoutMs: "SYSTEMD_CONTROL_API_ACTION_TIMEOUT_MS",
  logLevel: "LOG_LEVEL",
} as const;

export const BACKEND_KINDS = ["auto", "dbus", "systemctl"] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

export type SecurityConfig = Readonly<{
  apiKey?: string;
  allowedHosts: readonly string[];
}>;

export type SystemdControlConfig = Readonly<{
  security: SecurityConfig;
  port: number;
  host: string;
  services: readonly ServiceRecord[];
  backend: BackendKind;
  statusTimeoutMs: number;
  actionTimeoutMs: number;
  logLevel: LevelWithSilent;
}>;

/** Malformed env at startup. Fatal: the process does not start. */
export class ConfigInvalidError extends Error {
  public readonly code = "CONFIG_INVALID";

  public constructor(
    public readonly variable: string,
    reason: string
  ) {
    super(`Invalid configuration ${variable}: ${reason}`);
    this.name = "ConfigInvalidError";
  }
}

function parseWith<T>(
  variable: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown
): T {
  const r = schema.safeParse(raw);
  if (r.success) return r.data;
  const reason = r.error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
  throw new ConfigInvalidError(variable, reason);
}

const zIntString = (min: number, max: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

/** Comma-separated allowlist → trimmed, non-empty entries, order kept. */
export function parseAllowedHosts(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((h) => h.trim())
    .filter(Boolean);
}

function parseServices(raw: string | undefined): ServiceRecord[] {
  let json: unknown;
  try {
    json = JSON.parse(raw ?? "[]");
  } catch {
    throw new ConfigInvalidError(ENV.services, "must be valid JSON");
  }
  return parseWith(ENV.services, zServiceRecordList, json);
}

function freezeRecord(r: ServiceRecord): ServiceRecord {
  return Object.freeze({
    ...r,
    ...(r.metadata ? { metadata: Object.freeze({ ...r.metadata }) } : {}),
  });
}

export function loadConfig(env: NodeJS.ProcessEnv): SystemdControlConfig {
  const apiKey = env[ENV.apiKey] || undefined;

  const port = parseWith(
    ENV.port,
    zIntString(0, 65535),
    optionalEnv(env, ENV.port) ?? "8080"
  );
  const statusTimeoutMs = parseWith(
    ENV.statusTimeoutMs,
    zIntString(1, 600_000),
    optionalEnv(env, ENV.statusTimeoutMs) ?? "5000"
  );
  const actionTimeoutMs = parseWith(
    ENV.actionTimeoutMs,
    zIntString(1, 600_000),
    optionalEnv(env, ENV.actionTimeoutMs) ?? "30000"
  );
  const backend = parseWith(
    ENV.backend,
    z.enum(BACKEND_KINDS),
    optionalEnv(env, ENV.backend) ?? "auto"
  );

  const logLevel = optionalEnv(env, ENV.logLevel) ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigInvalidError(ENV.logLevel, `unknown level "${logLevel}"`);
  }

  const services = parseServices(env[ENV.services]);
  const allowedHosts = parseAllowedHosts(env[ENV.allowedHosts]);

  return Object.freeze({
    security: Object.freeze({
      ...(apiKey ? { apiKey } : {}),
      allowedHosts: Object.freeze(allowedHosts),
    }),
    port,
    host: optionalEnv(env, ENV.host) ?? "0.0.0.0",
    services: Object.freeze(services.map(freezeRecord)),
    backend,
    statusTimeoutMs,
    actionTimeoutMs,
    logLevel,
  });
}
