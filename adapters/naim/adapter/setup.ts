import { z } from "zod";
import type { DeviceSetupOutcome, DiscoverResult, SetupResult } from "@naim-bridge/adapter-sdk";
import type { DeviceClient, DeviceConfig, DeviceInfo } from "./types.js";
import { DEFAULT_PORT, MAX_DEVICES } from "./types.js";
import type { DeviceRegistry } from "./registry.js";
import type { ConfigStore } from "./config-store.js";
import {
  CapacityExceededError,
  ConfigInvalidError,
  DuplicateDeviceError,
  NaimError,
  describeError,
} from "./errors.js";
import { parseDeviceInfo } from "./poller.js";

const addParams = z.object({
  action: z.literal("add"),
  devices: z
    .array(z.object({ address: z.string().min(1), name: z.string().min(1).optional() }))
    .min(1, "at least one device is required"),
});

const removeParams = z.object({
  action: z.literal("remove"),
  deviceIds: z.array(z.string().min(1)).min(1, "at least one device id is required"),
});

const setupParams = z.discriminatedUnion("action", [addParams, removeParams]);

const discoverParams = z.object({
  addresses: z.array(z.string().min(1)).min(1, "at least one address is required"),
});

export interface DeviceAddress {
  host: string;
  port: number;
  apiPath?: string;
}

/**
 * Parse `host`, `host:port`, `[v6]` or `[v6]:port`. An optional http://
 * prefix and trailing slash are tolerated.
 */
export function parseAddress(input: string): DeviceAddress {
  const value = input
    .trim()
    .replace(/^https?:\/\//i, "")
    .replace(/\/+$/, "");
  if (!value) throw new ConfigInvalidError("Address is empty");

  let host = value;
  let portText: string | null = null;

  const bracketed = /^\[([^\]]+)\](?::(\d*))?$/.exec(value);
  if (bracketed) {
    host = bracketed[1] ?? "";
    portText = bracketed[2] ?? null;
  } else if (value.split(":").length === 2) {
    const [h = "", p = ""] = value.split(":");
    host = h;
    portText = p;
  }

  if (!host || /[\s/[\]]/.test(host)) {
    throw new ConfigInvalidError(`Invalid host in address: ${input}`);
  }

  let port = DEFAULT_PORT;
  if (portText !== null) {
    if (!/^\d+$/.test(portText)) throw new ConfigInvalidError(`Invalid port in address: ${input}`);
    port = Number(portText);
    if (port < 1 || port > 65535) throw new ConfigInvalidError(`Port out of range in address: ${input}`);
  }
  return { host, port };
}

/** Stable device id: `naim_<host with . and : replaced>_<port>`. */
export function deviceIdFor(host: string, port: number): string {
  return `naim_${host.toLowerCase().replace(/[.:]/g, "_")}_${port}`;
}

export function formatAddress({ host, port }: DeviceAddress): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

export interface SetupFlowOptions {
  registry: DeviceRegistry;
  store: ConfigStore;
  createClient: (address: DeviceAddress) => DeviceClient;
}

/**
 * Batch add/remove of devices. Each entry is handled on its own so one bad
 * address never blocks the rest; every change is persisted right away.
 */
export class SetupFlow {
  private registry: DeviceRegistry;
  private store: ConfigStore;
  private createClient: (address: DeviceAddress) => DeviceClient;

  constructor(options: SetupFlowOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.createClient = options.createClient;
  }

  async run(params: Record<string, unknown>): Promise<SetupResult> {
    const parsed = setupParams.safeParse(params);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return { success: false, devices: [], message: `Invalid setup request: ${issue?.message ?? "invalid"}` };
    }

    const request = parsed.data;
    const outcomes: DeviceSetupOutcome[] = [];
    if (request.action === "add") {
      for (const device of request.devices) {
        outcomes.push(await this.addOne(device.address, device.name));
      }
    } else {
      for (const id of request.deviceIds) {
        outcomes.push(this.removeOne(id));
      }
    }

    const succeeded = outcomes.filter((o) => o.success).length;
    const verb = request.action === "add" ? "Added" : "Removed";
    return {
      success: succeeded > 0,
      devices: outcomes,
      entities: succeeded > 0 ? this.registry.entities() : undefined,
      message: `${verb} ${succeeded} of ${outcomes.length} device(s)`,
    };
  }

  async discover(params: Record<string, unknown>): Promise<DiscoverResult> {
    const parsed = discoverParams.safeParse(params);
    if (!parsed.success) {
      return { devices: [], message: `Invalid discover request: ${parsed.error.issues[0]?.message ?? "invalid"}` };
    }

    const probes = await Promise.all(
      parsed.data.addresses.map(async (input) => {
        let address: DeviceAddress;
        try {
          address = parseAddress(input);
        } catch (err) {
          console.warn(`[Setup] Skipping ${input}:`, describeError(err));
          return null;
        }
        try {
          const { info } = await this.probe(address);
          return { address, info };
        } catch (err) {
          console.info(`[Setup] No device at ${formatAddress(address)}:`, describeError(err));
          return null;
        }
      }),
    );

    const devices: DiscoverResult["devices"] = [];
    for (const found of probes) {
      if (!found) continue;
      const { address, info } = found;
      const id = deviceIdFor(address.host, address.port);
      devices.push({
        id,
        name: info.hostname || info.model || `Naim Device (${address.host})`,
        address: formatAddress(address),
        metadata: { model: info.model, configured: this.registry.get(id) !== undefined },
      });
    }
    return { devices, message: `Found ${devices.length} of ${probes.length} address(es)` };
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private async addOne(input: string, name: string | undefined): Promise<DeviceSetupOutcome> {
    try {
      const address = parseAddress(input);
      const id = deviceIdFor(address.host, address.port);
      this.assertAddable(id, address);

      const { info, apiPath } = await this.probe(address);

      const config: DeviceConfig = {
        id,
        name: name?.trim() || info.hostname || `Naim Device (${address.host})`,
        host: address.host,
        port: address.port,
        enabled: true,
        apiPath: apiPath || undefined,
      };
      // Saved first: a device that cannot be persisted never starts polling.
      this.store.upsert(config);
      try {
        this.registry.addDevice(config);
      } catch (err) {
        this.store.remove(id);
        throw err;
      }
      console.info(`[Setup] Added ${config.name} as ${id}`);
      return { input, success: true, deviceId: id, name: config.name };
    } catch (err) {
      console.warn(`[Setup] Could not add ${input}:`, describeError(err));
      return {
        input,
        success: false,
        error: describeError(err),
        code: err instanceof NaimError ? err.code : undefined,
      };
    }
  }

  private removeOne(id: string): DeviceSetupOutcome {
    try {
      const removedStored = this.store.remove(id);
      const removedLive = this.registry.removeDevice(id);
      if (!removedLive && !removedStored) {
        return { input: id, success: false, error: `Unknown device: ${id}`, code: "NOT_FOUND" };
      }
      return { input: id, success: true, deviceId: id };
    } catch (err) {
      console.warn(`[Setup] Could not remove ${id}:`, describeError(err));
      return { input: id, success: false, error: describeError(err) };
    }
  }

  /** Checks the persisted list too, so disabled devices count as taken. */
  private assertAddable(id: string, address: DeviceAddress): void {
    const live = this.registry.get(id) ?? this.registry.findByAddress(address.host, address.port);
    const stored =
      this.store.get(id) ??
      this.store
        .list()
        .find((d) => d.host.toLowerCase() === address.host.toLowerCase() && d.port === address.port);
    const existing = live?.config ?? stored;
    if (existing) {
      throw new DuplicateDeviceError(formatAddress(address), existing.id);
    }
    if (this.registry.size >= MAX_DEVICES) {
      throw new CapacityExceededError(MAX_DEVICES);
    }
  }

  /** Finds the API path first, then reads `/system` through it. */
  private async probe(address: DeviceAddress): Promise<{ info: DeviceInfo; apiPath: string }> {
    const apiPath = await this.createClient(address).detectApiPath();
    const client = this.createClient({ ...address, apiPath });
    return { info: parseDeviceInfo(await client.fetchSystemInfo()), apiPath };
  }
}
