import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { DeviceConfig } from "./types.js";
import { DEFAULT_PORT } from "./types.js";
import { describeError } from "./errors.js";

export const CONFIG_FILE = "config.json";

const apiPathSchema = z.string().regex(/^(\/[\w-]+)+$/, "apiPath must look like /segment");

export const deviceConfigSchema = z.object({
  id: z.string().min(1, "id is required"),
  name: z.string().min(1, "name is required"),
  host: z
    .string()
    .min(1, "host is required")
    .refine((h) => !/[\s/]/.test(h), "host must not contain whitespace or slashes"),
  port: z.number().int().min(1).max(65535),
  enabled: z.boolean(),
  apiPath: apiPathSchema.optional(),
});

/** On-disk shape of one device: `config.json` keys devices by id. */
const storedDeviceSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  enabled: z.boolean().default(true),
  apiPath: apiPathSchema.optional(),
});

const storedConfigSchema = z.object({
  devices: z.record(z.string(), z.unknown()).default({}),
});

type StoredDevice = z.infer<typeof storedDeviceSchema>;

/**
 * Persisted device list. Reads and writes are synchronous; the file is only
 * touched at startup and on setup changes.
 */
export class ConfigStore {
  readonly path: string;
  private devices = new Map<string, DeviceConfig>();

  constructor(configDir: string) {
    this.path = join(configDir, CONFIG_FILE);
  }

  load(): DeviceConfig[] {
    this.devices.clear();
    if (!existsSync(this.path)) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (err) {
      console.warn(`[ConfigStore] Ignoring unreadable ${this.path}:`, describeError(err));
      return [];
    }

    const parsed = storedConfigSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[ConfigStore] Ignoring ${this.path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return [];
    }

    for (const [id, entry] of Object.entries(parsed.data.devices)) {
      const device = storedDeviceSchema.safeParse(entry);
      if (!device.success) {
        console.warn(`[ConfigStore] Skipping device ${id}: ${device.error.issues[0]?.message ?? "invalid"}`);
        continue;
      }
      const { name, address, port, enabled, apiPath } = device.data;
      this.devices.set(id, { id, name, host: address, port, enabled, apiPath });
    }
    return this.list();
  }

  list(): DeviceConfig[] {
    return [...this.devices.values()];
  }

  get(id: string): DeviceConfig | undefined {
    return this.devices.get(id);
  }

  /** Writes first; the in-memory list only changes once the file is saved. */
  upsert(device: DeviceConfig): void {
    const next = new Map(this.devices).set(device.id, device);
    this.write(next);
    this.devices = next;
  }

  remove(id: string): boolean {
    if (!this.devices.has(id)) return false;
    const next = new Map(this.devices);
    next.delete(id);
    this.write(next);
    this.devices = next;
    return true;
  }

  private write(entries: Map<string, DeviceConfig>): void {
    const devices: Record<string, StoredDevice> = {};
    for (const d of entries.values()) {
      devices[d.id] = { name: d.name, address: d.host, port: d.port, enabled: d.enabled, apiPath: d.apiPath };
    }

    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.path, JSON.stringify({ devices }, null, 2));
  }
}
