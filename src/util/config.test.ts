import { describe, expect, it } from "vitest";

import { isAllowed, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ DEVICEGATE_API_BASE: "https://devices.example.test/api/" });

    expect(config).toEqual({
      apiBase: "https://devices.example.test/api",
      apiKey: "",
      dryRun: false,
      dryRunDevices: [],
      allowlist: new Set(),
      rateWindowCapacity: 30,
      rateWindowDurationMs: 60_000,
      minRequestSpacingMs: 2_000,
      pollIntervalMs: 5_000,
      requestTimeoutMs: 10_000,
      logLevel: "info",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("parses numbers, flags and id lists", () => {
    const config = loadConfig({
      DEVICEGATE_DRY_RUN: "TRUE",
      DEVICEGATE_DRY_RUN_DEVICES: "a1, b2",
      DEVICEGATE_ALLOWLIST: "a1 c3",
      DEVICEGATE_RATE_CAPACITY: "10",
      DEVICEGATE_MIN_SPACING_MS: "0",
      DEVICEGATE_POLL_INTERVAL_MS: "15000",
      DEVICEGATE_LOG_LEVEL: "debug",
    });

    expect(config.dryRun).toBe(true);
    expect(config.dryRunDevices).toEqual(["a1", "b2"]);
    expect([...config.allowlist]).toEqual(["a1", "c3"]);
    expect(config.rateWindowCapacity).toBe(10);
    expect(config.minRequestSpacingMs).toBe(0);
    expect(config.pollIntervalMs).toBe(15_000);
    expect(config.logLevel).toBe("debug");
  });

  it("requires an API base outside dry-run mode", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(
      "Invalid configuration: DEVICEGATE_API_BASE: required unless DEVICEGATE_DRY_RUN=true",
    );
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({
      DEVICEGATE_DRY_RUN: "true",
      DEVICEGATE_API_BASE: "",
      DEVICEGATE_RATE_CAPACITY: "",
      DEVICEGATE_MIN_SPACING_MS: "",
      DEVICEGATE_LOG_LEVEL: "",
    });

    expect(config.apiBase).toBe("");
    expect(config.rateWindowCapacity).toBe(30);
    expect(config.minRequestSpacingMs).toBe(2_000);
    expect(config.logLevel).toBe("info");
    expect(() => loadConfig({ DEVICEGATE_API_BASE: "" })).toThrow(
      "Invalid configuration: DEVICEGATE_API_BASE: required unless DEVICEGATE_DRY_RUN=true",
    );
  });

  it("rejects a zero-length rate window", () => {
    expect(() => loadConfig({ DEVICEGATE_DRY_RUN: "true", DEVICEGATE_RATE_WINDOW_MS: "0" })).toThrow(
      /^Invalid configuration: DEVICEGATE_RATE_WINDOW_MS: /,
    );
  });

  it("lists every invalid field", () => {
    let caught: unknown;
    try {
      loadConfig({ DEVICEGATE_DRY_RUN: "true", DEVICEGATE_RATE_CAPACITY: "0", DEVICEGATE_LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const fields = caught instanceof ConfigError ? caught.issues.map((i) => i.split(":")[0]) : [];
    expect(fields).toEqual(["DEVICEGATE_RATE_CAPACITY", "DEVICEGATE_LOG_LEVEL"]);
  });
});

describe("isAllowed", () => {
  it("allows everything when the allowlist is empty", () => {
    expect(isAllowed({ allowlist: new Set() }, "x")).toBe(true);
  });

  it("only allows listed devices otherwise", () => {
    const config = { allowlist: new Set(["a1"]) };
    expect(isAllowed(config, "a1")).toBe(true);
    expect(isAllowed(config, "b2")).toBe(false);
  });
});
