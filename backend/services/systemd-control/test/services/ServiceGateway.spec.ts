// backend/services/systemd-control/test/services/ServiceGateway.spec.ts
import { describe, it, expect } from "vitest";
import { NotFoundError } from "@shared/problem/problem";
import type { ServiceRecord } from "../../src/contracts/service.contract";
import { ServiceGateway } from "../../src/services/ServiceGateway";
import { FakeController } from "../helpers/fakeController";
import { FIXED_NOW } from "../helpers/runtime";

const SERVICES: ServiceRecord[] = [
  { service: "nginx.service", displayName: "Web Server", description: "proxy" },
  {
    service: "db.service",
    displayName: "Database",
    description: "",
    metadata: { tier: "data" },
  },
  { service: "cache.service", displayName: "Cache", description: "kv" },
];

function gateway(controller: FakeController, timeoutMs = 50) {
  return new ServiceGateway(SERVICES, controller, {
    statusTimeoutMs: timeoutMs,
    actionTimeoutMs: timeoutMs,
    now: () => FIXED_NOW,
  });
}

describe("ServiceGateway.listServices", () => {
  it("maps each configured unit in order", async () => {
    const fake = new FakeController();
    fake.states.set("db.service", { status: "inactive", enabled: false });

    expect(await gateway(fake).listServices()).toEqual([
      {
        service: "nginx.service",
        display_name: "Web Server",
        description: "proxy",
        status: "active",
        enabled: true,
        metadata: null,
      },
      {
        service: "db.service",
        display_name: "Database",
        description: "",
        status: "inactive",
        enabled: false,
        metadata: { tier: "data" },
      },
      {
        service: "cache.service",
        display_name: "Cache",
        description: "kv",
        status: "active",
        enabled: true,
        metadata: null,
      },
    ]);
    expect(fake.statusCalls).toEqual([
      { unit: "nginx.service", timeoutMs: 50 },
      { unit: "db.service", timeoutMs: 50 },
      { unit: "cache.service", timeoutMs: 50 },
    ]);
  });

  it("degrades only the unit whose backend call fails", async () => {
    const fake = new FakeController();
    fake.states.set("db.service", new Error("bus down"));

    const [nginx, db, cache] = await gateway(fake).listServices();
    expect(db).toMatchObject({ status: "error", enabled: false });
    expect(nginx.status).toBe("active");
    expect(cache.status).toBe("active");
  });

  it("reports a slow unit as unknown without delaying the rest", async () => {
    const fake = new FakeController();
    fake.states.set("nginx.service", "hang");

    const statuses = await gateway(fake, 20).listServices();
    expect(statuses.map((s) => [s.service, s.status, s.enabled])).toEqual([
      ["nginx.service", "unknown", false],
      ["db.service", "active", true],
      ["cache.service", "active", true],
    ]);
  });

  it("passes degraded states from the controller through", async () => {
    const fake = new FakeController();
    fake.states.set("cache.service", { status: "not-found", enabled: false, error: "no unit" });

    const statuses = await gateway(fake).listServices();
    expect(statuses[2]).toMatchObject({ status: "not-found", enabled: false });
  });
});

describe("ServiceGateway.performAction", () => {
  it("rejects unknown services before touching the backend", async () => {
    const fake = new FakeController();
    const err = await gateway(fake)
      .performAction("ghost.service", "restart")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    if (err instanceof NotFoundError) {
      expect(err.status).toBe(404);
      expect(err.message).toBe(
        "Service 'ghost.service' not found in configured services"
      );
    }
    expect(fake.controlCalls).toEqual([]);
  });

  it("relays the controller result with the display name", async () => {
    const fake = new FakeController();
    fake.controlOutcome = { success: false, message: "Service restart failed: boom" };

    expect(await gateway(fake).performAction("db.service", "restart")).toEqual({
      success: false,
      message: "Service restart failed: boom",
      display_name: "Database",
    });
    expect(fake.controlCalls).toEqual([
      { unit: "db.service", action: "restart", timeoutMs: 50 },
    ]);
  });

  it("reports success messages verbatim", async () => {
    const fake = new FakeController();
    expect(await gateway(fake).performAction("nginx.service", "stop")).toEqual({
      success: true,
      message: "Service stop successful",
      display_name: "Web Server",
    });
  });

  it("turns a controller rejection into success:false", async () => {
    const fake = new FakeController();
    fake.controlOutcome = new Error("spawn EACCES");

    expect(await gateway(fake).performAction("nginx.service", "start")).toEqual({
      success: false,
      message: "spawn EACCES",
      display_name: "Web Server",
    });
  });

  it("times out a stuck action", async () => {
    const fake = new FakeController();
    fake.controlOutcome = "hang";

    expect(await gateway(fake, 20).performAction("cache.service", "start")).toEqual({
      success: false,
      message: "Command timed out",
      display_name: "Cache",
    });
  });
});

describe("ServiceGateway.health", () => {
  it("counts services without calling the backend", () => {
    const fake = new FakeController();
    expect(gateway(fake).health()).toEqual({
      status: "healthy",
      timestamp: "2026-03-01T12:00:00.000Z",
      services_count: 3,
    });
    expect(fake.statusCalls).toEqual([]);
  });
});
