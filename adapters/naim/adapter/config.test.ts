import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { loadSettings } from "./config.js";

describe("loadSettings", () => {
  it("uses defaults", () => {
    expect(loadSettings({}, {})).toEqual({
      configDir: process.cwd(),
      pollIntervalMs: 5_000,
      requestTimeoutMs: 3_000,
      failureThreshold: 3,
      volumeStep: 3,
    });
  });

  it("reads NAIM_* variables and falls back to UC_CONFIG_HOME", () => {
    const settings = loadSettings(
      {},
      { UC_CONFIG_HOME: "/data/uc", NAIM_POLL_INTERVAL_MS: "2000", NAIM_FAILURE_THRESHOLD: "5" },
    );
    expect(settings).toMatchObject({ configDir: resolve("/data/uc"), pollIntervalMs: 2_000, failureThreshold: 5 });

    expect(loadSettings({}, { NAIM_CONFIG_HOME: "/data/naim", UC_CONFIG_HOME: "/data/uc" }).configDir).toBe(
      resolve("/data/naim"),
    );
  });

  it("lets the init config override the environment", () => {
    const settings = loadSettings(
      { configDir: "/srv/naim", pollIntervalMs: 10_000, volumeStep: 5 },
      { NAIM_CONFIG_HOME: "/data/naim", NAIM_POLL_INTERVAL_MS: "2000" },
    );
    expect(settings).toMatchObject({ configDir: resolve("/srv/naim"), pollIntervalMs: 10_000, volumeStep: 5 });
  });

  it("ignores values that are not usable numbers", () => {
    const settings = loadSettings({ failureThreshold: 0 }, { NAIM_REQUEST_TIMEOUT_MS: "soon", NAIM_POLL_INTERVAL_MS: "5" });
    expect(settings).toMatchObject({ requestTimeoutMs: 3_000, pollIntervalMs: 5_000, failureThreshold: 3 });
  });
});
