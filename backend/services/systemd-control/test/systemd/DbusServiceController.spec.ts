// backend/services/systemd-control/test/systemd/DbusServiceController.spec.ts
import { describe, it, expect } from "vitest";
import {
  DbusServiceController,
  MANAGER_IFACE,
  MANAGER_PATH,
  PROPERTIES_IFACE,
  UNIT_IFACE,
  type DbusPort,
} from "../../src/systemd/DbusServiceController";

type Call = { path: string; iface: string; member: string; args: readonly unknown[] };

const NGINX_PATH = "/org/freedesktop/systemd1/unit/nginx_2eservice";

/** In-process stand-in for the system bus, answering by call signature. */
class FakePort implements DbusPort {
  public readonly calls: Call[] = [];
  public disconnects = 0;
  private readonly answers = new Map<string, unknown>();

  private static key(path: string, member: string, args: readonly unknown[]): string {
    return `${path} ${member} ${args.map(String).join(",")}`;
  }

  public on(path: string, member: string, args: readonly unknown[], reply: unknown): this {
    this.answers.set(FakePort.key(path, member, args), reply);
    return this;
  }

  public unit(path: string, active: unknown, fileState: unknown): this {
    return this.on(path, "Get", [UNIT_IFACE, "ActiveState"], active).on(
      path,
      "Get",
      [UNIT_IFACE, "UnitFileState"],
      fileState
    );
  }

  public async call(
    path: string,
    iface: string,
    member: string,
    args: readonly unknown[]
  ): Promise<unknown> {
    this.calls.push({ path, iface, member, args });
    const k = FakePort.key(path, member, args);
    if (!this.answers.has(k)) throw new Error(`No such method ${member} for ${args.map(String).join(",")}`);
    const reply = this.answers.get(k);
    if (reply instanceof Error) throw reply;
    return reply;
  }

  public disconnect(): void {
    this.disconnects += 1;
  }
}

const variant = (value: unknown) => ({ signature: "s", value });

describe("DbusServiceController.getStatus", () => {
  it("reads state from a loaded unit", async () => {
    const port = new FakePort()
      .on(MANAGER_PATH, "GetUnit", ["nginx.service"], NGINX_PATH)
      .unit(NGINX_PATH, variant("active"), variant("enabled"));

    expect(await new DbusServiceController(port).getStatus("nginx.service")).toEqual({
      status: "active",
      enabled: true,
    });
    expect(port.calls[0]).toEqual({
      path: MANAGER_PATH,
      iface: MANAGER_IFACE,
      member: "GetUnit",
      args: ["nginx.service"],
    });
    expect(port.calls.slice(1).map((c) => c.iface)).toEqual([
      PROPERTIES_IFACE,
      PROPERTIES_IFACE,
    ]);
  });

  it("falls back to LoadUnit when the unit is not loaded", async () => {
    const port = new FakePort()
      .on(MANAGER_PATH, "GetUnit", ["nginx.service"], new Error("Unit nginx.service not loaded."))
      .on(MANAGER_PATH, "LoadUnit", ["nginx.service"], NGINX_PATH)
      .unit(NGINX_PATH, variant("inactive"), variant("disabled"));

    expect(await new DbusServiceController(port).getStatus("nginx.service")).toEqual({
      status: "inactive",
      enabled: false,
    });
  });

  it("reports not-found when both lookups fail", async () => {
    const port = new FakePort()
      .on(MANAGER_PATH, "GetUnit", ["ghost.service"], new Error("Unit ghost.service not loaded."))
      .on(MANAGER_PATH, "LoadUnit", ["ghost.service"], new Error("Unit ghost.service not found."));

    expect(await new DbusServiceController(port).getStatus("ghost.service")).toEqual({
      status: "not-found",
      enabled: false,
      error: "Unit ghost.service not found.",
    });
  });

  it("retries through LoadUnit when a loaded unit's properties fail", async () => {
    const port = new FakePort()
      .on(MANAGER_PATH, "GetUnit", ["nginx.service"], NGINX_PATH)
      .on(MANAGER_PATH, "LoadUnit", ["nginx.service"], "/loaded/nginx")
      .unit(NGINX_PATH, new Error("Access denied"), variant("enabled"))
      .unit("/loaded/nginx", variant("active"), variant("enabled"));

    expect(await new DbusServiceController(port).getStatus("nginx.service")).toEqual({
      status: "active",
      enabled: true,
    });
    expect(port.calls.filter((c) => c.iface === MANAGER_IFACE).map((c) => c.member)).toEqual([
      "GetUnit",
      "LoadUnit",
    ]);
  });

  it("reports not-found when properties fail on both paths", async () => {
    const port = new FakePort()
      .on(MANAGER_PATH, "GetUnit", ["nginx.service"], NGINX_PATH)
      .on(MANAGER_PATH, "LoadUnit", ["nginx.service"], NGINX_PATH)
      .unit(NGINX_PATH, new Error("Access denied"), variant("enabled"));

    expect(await new DbusServiceController(port).getStatus("nginx.service")).toEqual({
      status: "not-found",
      enabled: false,
      error: "Access denied",
    });
  });

  it("reports not-found on a malformed property reply", async () => {
    const port = new FakePort()
      .on(MANAGER_PATH, "GetUnit", ["nginx.service"], NGINX_PATH)
      .on(MANAGER_PATH, "LoadUnit", ["nginx.service"], NGINX_PATH)
      .unit(NGINX_PATH, variant(42), variant("enabled"));

    const state = await new DbusServiceController(port).getStatus("nginx.service");
    expect(state.status).toBe("not-found");
    expect(state.enabled).toBe(false);
  });
});

describe("DbusServiceController.control", () => {
  it.each([
    ["start", "StartUnit"],
    ["stop", "StopUnit"],
    ["restart", "RestartUnit"],
  ] as const)("%s calls %s with mode replace", async (action, member) => {
    const port = new FakePort().on(
      MANAGER_PATH,
      member,
      ["nginx.service", "replace"],
      "/org/freedesktop/systemd1/job/42"
    );

    expect(await new DbusServiceController(port).control("nginx.service", action)).toEqual({
      success: true,
      message: `Service ${action} successful`,
    });
    expect(port.calls).toEqual([
      {
        path: MANAGER_PATH,
        iface: MANAGER_IFACE,
        member,
        args: ["nginx.service", "replace"],
      },
    ]);
  });

  it("returns the bus error as the message", async () => {
    const port = new FakePort().on(
      MANAGER_PATH,
      "RestartUnit",
      ["nginx.service", "replace"],
      new Error("Interactive authentication required.")
    );

    expect(await new DbusServiceController(port).control("nginx.service", "restart")).toEqual({
      success: false,
      message: "Interactive authentication required.",
    });
  });
});

describe("DbusServiceController.close", () => {
  it("disconnects once", () => {
    const port = new FakePort();
    const ctl = new DbusServiceController(port);
    ctl.close();
    ctl.close();
    expect(port.disconnects).toBe(1);
  });
});
