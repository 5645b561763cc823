// backend/services/systemd-control/src/runtime/RuntimeHolder.ts

/**
 * Why:
 * - Config, policy and gateway move together. A reload builds a complete new
 *   triple and swaps one reference, so a request that read the holder once
 *   sees either the old snapshot or the new one, never a mix.
 *
 * Notes:
 * - The controller outlives reloads; it is picked once at startup.
 */

import type { SystemdControlConfig } from "../config";
import { SecurityPolicy } from "../security/SecurityPolicy";
import { ServiceGateway } from "../services/ServiceGateway";
import type { ServiceController } from "../systemd/ServiceController";

export type AppRuntime = Readonly<{
  config: SystemdControlConfig;
  policy: SecurityPolicy;
  gateway: ServiceGateway;
}>;

export function buildRuntime(
  config: SystemdControlConfig,
  controller: ServiceController,
  now?: () => Date
): AppRuntime {
  return Object.freeze({
    config,
    policy: new SecurityPolicy(config.security),
    gateway: new ServiceGateway(config.services, controller, {
      statusTimeoutMs: config.statusTimeoutMs,
      actionTimeoutMs: config.actionTimeoutMs,
      now,
    }),
  });
}

export class RuntimeHolder {
  private current: AppRuntime;

  public constructor(initial: AppRuntime) {
    this.current = initial;
  }

  public get(): AppRuntime {
    return this.current;
  }

  /** Swap in a fully built runtime; returns the one it replaced. */
  public replace(next: AppRuntime): AppRuntime {
    const prev = this.current;
    this.current = next;
    return prev;
  }
}
