// backend/services/systemd-control/src/systemd/selectController.ts

import fs from "fs";
import type { BackendKind } from "../config";
import type { BackendName, ServiceController } from "./ServiceController";
import { DbusServiceController, systemBusPort } from "./DbusServiceController";
import { SystemctlServiceController } from "./SystemctlServiceController";

export const SYSTEM_BUS_SOCKET = "/run/dbus/system_bus_socket";

type Probe = Readonly<{
  env: NodeJS.ProcessEnv;
  exists: (file: string) => boolean;
}>;

/** `auto` → D-Bus when a system bus is reachable by address or socket. */
export function resolveBackend(
  kind: BackendKind,
  probe: Probe = { env: process.env, exists: fs.existsSync }
): BackendName {
  if (kind !== "auto") return kind;
  if (probe.env.DBUS_SYSTEM_BUS_ADDRESS?.trim()) return "dbus";
  return probe.exists(SYSTEM_BUS_SOCKET) ? "dbus" : "systemctl";
}

/** Build the controller once at startup; reloads keep it. */
export function selectController(
  kind: BackendKind,
  probe?: Probe
): ServiceController {
  return resolveBackend(kind, probe) === "dbus"
    ? new DbusServiceController(systemBusPort())
    : new SystemctlServiceController();
}
