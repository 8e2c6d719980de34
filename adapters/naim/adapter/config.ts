import { resolve } from "node:path";
import { homedir } from "node:os";
import { DEFAULT_REQUEST_TIMEOUT } from "./naim-client.js";

export interface NaimSettings {
  /** Directory holding config.json */
  configDir: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  /** Consecutive failed polls before a device is marked unreachable */
  failureThreshold: number;
  volumeStep: number;
}

const defaults: NaimSettings = {
  configDir: process.cwd(),
  pollIntervalMs: 5_000,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT,
  failureThreshold: 3,
  volumeStep: 3,
};

function expandHome(path: string): string {
  return path.replace(/^~(?=$|\/)/, homedir());
}

function positiveInt(value: unknown, fallback: number, min = 1): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) && parsed >= min ? Math.floor(parsed) : fallback;
}

/**
 * Settings come from defaults, then `NAIM_*` environment variables, then the
 * host's init config (which wins).
 */
export function loadSettings(
  config: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): NaimSettings {
  const envDir = env.NAIM_CONFIG_HOME || env.UC_CONFIG_HOME;
  const configDir = typeof config.configDir === "string" && config.configDir ? config.configDir : envDir;

  const pollIntervalMs = positiveInt(env.NAIM_POLL_INTERVAL_MS, defaults.pollIntervalMs, 100);
  const requestTimeoutMs = positiveInt(env.NAIM_REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs, 100);
  const failureThreshold = positiveInt(env.NAIM_FAILURE_THRESHOLD, defaults.failureThreshold);

  return {
    ...defaults,
    configDir: configDir ? resolve(expandHome(configDir)) : defaults.configDir,
    pollIntervalMs: positiveInt(config.pollIntervalMs, pollIntervalMs, 100),
    requestTimeoutMs: positiveInt(config.requestTimeoutMs, requestTimeoutMs, 100),
    failureThreshold: positiveInt(config.failureThreshold, failureThreshold),
    volumeStep: positiveInt(config.volumeStep, positiveInt(env.NAIM_VOLUME_STEP, defaults.volumeStep)),
  };
}
