// backend/services/systemd-control/src/services/ServiceGateway.ts

/**
 * Why:
 * - Thin orchestration between the configured unit list and the backend.
 *   Holds no per-request state; one instance per config snapshot.
 *
 * Invariants:
 * - listServices(): one status call per configured unit, concurrent, each
 *   bounded by statusTimeoutMs. A failed or slow unit degrades only its own
 *   entry ("error" / "unknown"); order follows configuration.
 * - performAction(): unknown names fail with NotFoundError before the backend
 *   is touched. Backend failures come back as `{ success:false }`, never 5xx.
 * - health(): never consults the backend.
 */

import { NotFoundError } from "@shared/problem/problem";
import { logger } from "@shared/utils/logger";
import type {
  ActionResult,
  HealthResponse,
  ServiceAction,
  ServiceRecord,
  ServiceStatus,
} from "../contracts/service.contract";
import {
  messageOf,
  TIMED_OUT_MESSAGE,
  type ServiceController,
  type ServiceState,
} from "../systemd/ServiceController";
import { TimeoutError, withTimeout } from "../systemd/withTimeout";

export type GatewayOptions = Readonly<{
  statusTimeoutMs: number;
  actionTimeoutMs: number;
  now?: () => Date;
}>;

export const serviceNotFoundDetail = (name: string) =>
  `Service '${name}' not found in configured services`;

export class ServiceGateway {
  private readonly byName: ReadonlyMap<string, ServiceRecord>;
  private readonly now: () => Date;

  public constructor(
    private readonly services: readonly ServiceRecord[],
    private readonly controller: ServiceController,
    private readonly opts: GatewayOptions
  ) {
    // first record wins on duplicate unit names
    const byName = new Map<string, ServiceRecord>();
    for (const r of services) if (!byName.has(r.service)) byName.set(r.service, r);
    this.byName = byName;
    this.now = opts.now ?? (() => new Date());
  }

  public find(name: string): ServiceRecord | undefined {
    return this.byName.get(name);
  }

  private async stateOf(unit: string): Promise<ServiceState> {
    try {
      return await withTimeout(
        this.controller.getStatus(unit, this.opts.statusTimeoutMs),
        this.opts.statusTimeoutMs,
        `status ${unit}`
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        logger.warn({ unit, ms: err.ms }, "status query timed out");
        return { status: "unknown", enabled: false };
      }
      logger.error({ unit, err: messageOf(err) }, "status query failed");
      return { status: "error", enabled: false, error: messageOf(err) };
    }
  }

  public async listServices(): Promise<ServiceStatus[]> {
    return Promise.all(
      this.services.map(async (r): Promise<ServiceStatus> => {
        const state = await this.stateOf(r.service);
        return {
          service: r.service,
          display_name: r.displayName,
          description: r.description,
          status: state.status,
          enabled: state.enabled,
          metadata: r.metadata ? { ...r.metadata } : null,
        };
      })
    );
  }

  public async performAction(
    serviceName: string,
    action: ServiceAction
  ): Promise<ActionResult> {
    const record = this.find(serviceName);
    if (!record) throw new NotFoundError(serviceNotFoundDetail(serviceName));

    logger.info({ unit: record.service, action }, "service action requested");

    try {
      const result = await withTimeout(
        this.controller.control(record.service, action, this.opts.actionTimeoutMs),
        this.opts.actionTimeoutMs,
        `${action} ${record.service}`
      );
      return {
        success: result.success,
        message: result.message,
        display_name: record.displayName,
      };
    } catch (err) {
      const message =
        err instanceof TimeoutError ? TIMED_OUT_MESSAGE : messageOf(err);
      logger.error({ unit: record.service, action, err: messageOf(err) }, "service action failed");
      return { success: false, message, display_name: record.displayName };
    }
  }

  public health(): HealthResponse {
    return {
      status: "healthy",
      timestamp: this.now().toISOString(),
      services_count: this.services.length,
    };
  }

  public timestamp(): string {
    return this.now().toISOString();
  }
}
