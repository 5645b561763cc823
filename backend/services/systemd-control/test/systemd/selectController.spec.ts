// backend/services/systemd-control/test/systemd/selectController.spec.ts
import { describe, it, expect } from "vitest";
import {
  SYSTEM_BUS_SOCKET,
  resolveBackend,
  selectController,
} from "../../src/systemd/selectController";
import { SystemctlServiceController } from "../../src/systemd/SystemctlServiceController";

const noSocket = (_file: string) => false;

describe("resolveBackend", () => {
  it("honours an explicit choice", () => {
    expect(resolveBackend("dbus", { env: {}, exists: noSocket })).toBe("dbus");
    expect(
      resolveBackend("systemctl", {
        env: { DBUS_SYSTEM_BUS_ADDRESS: "unix:path=/tmp/bus" },
        exists: () => true,
      })
    ).toBe("systemctl");
  });

  it("picks D-Bus when a bus address is set", () => {
    expect(
      resolveBackend("auto", {
        env: { DBUS_SYSTEM_BUS_ADDRESS: "unix:path=/tmp/bus" },
        exists: noSocket,
      })
    ).toBe("dbus");
  });

  it("picks D-Bus when the system socket exists", () => {
    const seen: string[] = [];
    const exists = (file: string) => {
      seen.push(file);
      return true;
    };
    expect(resolveBackend("auto", { env: {}, exists })).toBe("dbus");
    expect(seen).toEqual([SYSTEM_BUS_SOCKET]);
  });

  it("falls back to systemctl", () => {
    expect(
      resolveBackend("auto", { env: { DBUS_SYSTEM_BUS_ADDRESS: "  " }, exists: noSocket })
    ).toBe("systemctl");
  });
});

describe("selectController", () => {
  it("builds the systemctl variant without touching a bus", () => {
    const ctl = selectController("systemctl");
    expect(ctl).toBeInstanceOf(SystemctlServiceController);
    expect(ctl.backend).toBe("systemctl");
  });
});
