// backend/services/systemd-control/src/bootstrap.ts

/**
 * Why:
 * - Seed process.env from an optional dotenv file before anything reads it.
 *   systemd's EnvironmentFile (or a plain export) needs no file here.
 * - Reload reads the same file with override, so edits win over boot values.
 */

import { loadEnvFileIfExists, optionalEnv } from "@shared/env";

export { SERVICE_NAME } from "./serviceName";

export const ENV_FILE_VAR = "SYSTEMD_CONTROL_API_ENV_FILE";

/** Returns the file that was loaded, if any. */
export function loadServiceEnv(opts: { override?: boolean } = {}): string | undefined {
  const file = optionalEnv(process.env, ENV_FILE_VAR);
  if (!file) return undefined;
  return loadEnvFileIfExists(file, opts) ? file : undefined;
}

loadServiceEnv();
