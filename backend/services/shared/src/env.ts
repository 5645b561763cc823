// backend/services/shared/src/env.ts

/**
 * Why:
 * - One place for env-file loading and small typed env readers.
 * - Services validate their own config; this file only reads and asserts.
 *
 * Notes:
 * - Env files are optional. Injected envs (systemd EnvironmentFile, docker)
 *   are the normal production path.
 * - `override` is used by runtime reload so edited files win over the values
 *   loaded at boot.
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Load a single env file if it exists; expand; return true if loaded. */
export function loadEnvFileIfExists(
  file: string,
  opts: { override?: boolean } = {}
): boolean {
  const absPath = path.resolve(file);
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath, override: opts.override });
  if (parsed.error)
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  expand(parsed);
  return true;
}

/** Trimmed value, or undefined when unset/blank. */
export function optionalEnv(
  env: NodeJS.ProcessEnv,
  name: string
): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const t = v.trim();
  return t === "" ? undefined : t;
}
