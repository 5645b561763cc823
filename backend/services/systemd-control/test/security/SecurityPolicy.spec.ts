// backend/services/systemd-control/test/security/SecurityPolicy.spec.ts
import { describe, it, expect } from "vitest";
import {
  SecurityPolicy,
  denialDetail,
} from "../../src/security/SecurityPolicy";

const KEY = "test-secret";

const policy = (apiKey: string | undefined, allowedHosts: string[] = []) =>
  new SecurityPolicy({ ...(apiKey ? { apiKey } : {}), allowedHosts });

describe("SecurityPolicy.evaluate", () => {
  describe("nothing configured", () => {
    it("grants every caller", () => {
      const p = policy(undefined);
      for (const [ip, token] of [
        ["10.0.0.5", undefined],
        ["not-an-ip", "whatever"],
        ["", ""],
      ] as const) {
        expect(p.evaluate(ip, token)).toEqual({
          granted: true,
          reasons: ["no security configured"],
        });
      }
    });
  });

  describe("API key only", () => {
    const p = policy(KEY);

    it("grants the exact key from any address", () => {
      expect(p.evaluate("203.0.113.9", KEY)).toEqual({ granted: true, reasons: [] });
    });

    it.each([
      ["wrong key", "nope"],
      ["different case", "TEST-SECRET"],
      ["prefix of key", "test"],
      ["missing", undefined],
    ])("denies %s as unauthorized", (_label, token) => {
      expect(p.evaluate("127.0.0.1", token)).toEqual({
        granted: false,
        reasons: ["invalid or missing API key"],
        kind: "unauthorized",
      });
    });
  });

  describe("allowlist only", () => {
    const p = policy(undefined, ["10.0.0.0/24"]);

    it("grants listed hosts regardless of token", () => {
      expect(p.evaluate("10.0.0.5").granted).toBe(true);
      expect(p.evaluate("10.0.0.5", "junk").granted).toBe(true);
    });

    it("denies other hosts as forbidden", () => {
      expect(p.evaluate("10.0.1.5", KEY)).toEqual({
        granted: false,
        reasons: ["host 10.0.1.5 not in allowed list"],
        kind: "forbidden",
      });
    });

    it("denies a caller with no known peer", () => {
      const loopback = policy(undefined, ["localhost", "127.0.0.0/8", "::1"]);
      expect(loopback.evaluate("unknown")).toEqual({
        granted: false,
        reasons: ["host unknown not in allowed list"],
        kind: "forbidden",
      });
    });
  });

  describe("key and allowlist", () => {
    const p = policy(KEY, ["10.0.0.0/24"]);

    it("grants only when both pass", () => {
      expect(p.evaluate("10.0.0.5", KEY)).toEqual({ granted: true, reasons: [] });
    });

    it("classifies a bad key as unauthorized even with a good host", () => {
      expect(p.evaluate("10.0.0.5", "nope")).toEqual({
        granted: false,
        reasons: ["invalid or missing API key"],
        kind: "unauthorized",
      });
    });

    it("classifies a bad host with a good key as forbidden", () => {
      expect(p.evaluate("192.0.2.1", KEY)).toEqual({
        granted: false,
        reasons: ["host 192.0.2.1 not in allowed list"],
        kind: "forbidden",
      });
    });

    it("reports both reasons, key first, as unauthorized", () => {
      expect(p.evaluate("192.0.2.1")).toEqual({
        granted: false,
        reasons: [
          "invalid or missing API key",
          "host 192.0.2.1 not in allowed list",
        ],
        kind: "unauthorized",
      });
    });
  });
});

describe("SecurityPolicy.describe", () => {
  it("names the configured methods", () => {
    expect(policy(undefined).describe()).toBe("NONE (reverse proxy mode)");
    expect(policy(KEY).describe()).toBe("API key");
    expect(policy(undefined, ["localhost", "10.0.0.0/8"]).describe()).toBe(
      "host allowlist (2 hosts)"
    );
    expect(policy(KEY, ["localhost"]).describe()).toBe(
      "API key + host allowlist (1 hosts)"
    );
  });

  it("exposes the derived predicates", () => {
    const p = policy(KEY);
    expect(p.hasApiKey).toBe(true);
    expect(p.hasHostRestriction).toBe(false);
  });
});

describe("denialDetail", () => {
  it("joins reasons after the prefix", () => {
    expect(denialDetail(["a", "b"])).toBe("Access denied: a, b");
  });
});
