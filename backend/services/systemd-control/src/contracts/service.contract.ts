// backend/services/systemd-control/src/contracts/service.contract.ts
/**
 * Wire and config contracts for the control API.
 *
 * - Config side uses the `displayName` key (the JSON operators already write).
 * - Wire side is snake_case (`display_name`, `services_count`, `last_updated`).
 */

import { z } from "zod";

export const SERVICE_ACTIONS = ["start", "stop", "restart"] as const;

export const zServiceAction = z.enum(SERVICE_ACTIONS);
export type ServiceAction = z.infer<typeof zServiceAction>;

/** One monitored unit, as configured. */
export const zServiceRecord = z.object({
  service: z.string().trim().min(1, "service (unit name) is required"),
  displayName: z.string(),
  description: z.string(),
  metadata: z.record(z.string(), z.string()).optional(),
});
export type ServiceRecord = Readonly<
  Omit<z.infer<typeof zServiceRecord>, "metadata"> & {
    metadata?: Readonly<Record<string, string>>;
  }
>;

export const zServiceRecordList = z.array(zServiceRecord);

export const zServiceStatus = z.object({
  service: z.string(),
  display_name: z.string(),
  description: z.string(),
  status: z.string(),
  enabled: z.boolean(),
  metadata: z.record(z.string(), z.string()).nullable(),
});
export type ServiceStatus = z.infer<typeof zServiceStatus>;

export const zServicesResponse = z.object({
  last_updated: z.string(),
  services: z.array(zServiceStatus),
});
export type ServicesResponse = z.infer<typeof zServicesResponse>;

export const zHealthResponse = z.object({
  status: z.literal("healthy"),
  timestamp: z.string(),
  services_count: z.number().int().min(0),
});
export type HealthResponse = z.infer<typeof zHealthResponse>;

export const zActionResult = z.object({
  success: z.boolean(),
  message: z.string(),
  display_name: z.string(),
});
export type ActionResult = z.infer<typeof zActionResult>;
