// backend/services/systemd-control/src/systemd/ServiceController.ts

/**
 * Backend port for systemd. One interface, two variants (D-Bus, systemctl),
 * picked once at startup by selectController(); callers never branch on
 * which one they hold.
 *
 * Contract:
 * - getStatus() resolves even when the unit or backend is broken; failures
 *   come back as a degraded `status` ("not-found", "error", "unknown").
 * - control() resolves `{ success:false, message }` instead of throwing.
 * - Both may still reject on programmer errors; the gateway isolates those.
 */

import type { ServiceAction } from "../contracts/service.contract";

export type BackendName = "dbus" | "systemctl";

export type ServiceState = Readonly<{
  status: string;
  enabled: boolean;
  error?: string;
}>;

export type ControlResult = Readonly<{
  success: boolean;
  message: string;
}>;

export interface ServiceController {
  readonly backend: BackendName;
  getStatus(unit: string, timeoutMs: number): Promise<ServiceState>;
  control(
    unit: string,
    action: ServiceAction,
    timeoutMs: number
  ): Promise<ControlResult>;
  /** Release backend resources (bus connection). Idempotent. */
  close(): void;
}

export const TIMED_OUT_MESSAGE = "Command timed out";

export const successMessage = (action: ServiceAction) =>
  `Service ${action} successful`;

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
