import type { AttributesListener, EntityRegistration } from "@naim-bridge/adapter-sdk";
import type { DeviceClient, DeviceConfig, DeviceSnapshot } from "./types.js";
import { MAX_DEVICES } from "./types.js";
import type { NaimSettings } from "./config.js";
import { CapacityExceededError, ConfigInvalidError, DuplicateDeviceError } from "./errors.js";
import { deviceConfigSchema } from "./config-store.js";
import { NaimClient } from "./naim-client.js";
import { DevicePoller } from "./poller.js";
import { MediaPlayerEntity } from "./media-player.js";
import { RemoteEntity } from "./remote.js";

export type RegistrySettings = Pick<
  NaimSettings,
  "pollIntervalMs" | "requestTimeoutMs" | "failureThreshold" | "volumeStep"
>;

export interface RegistryOptions {
  settings: RegistrySettings;
  createClient?: (config: DeviceConfig) => DeviceClient;
}

export interface RegistryEntry {
  config: DeviceConfig;
  client: DeviceClient;
  poller: DevicePoller;
  mediaPlayer: MediaPlayerEntity;
  remote: RemoteEntity;
}

export type EntityHandle =
  | { kind: "media_player"; entry: RegistryEntry; entity: MediaPlayerEntity }
  | { kind: "remote"; entry: RegistryEntry; entity: RemoteEntity };

function addressKey(host: string, port: number): string {
  return `${host.toLowerCase()}:${port}`;
}

/**
 * Owns every configured device: its client, poller and the two entities
 * bound to it. Capacity and host:port uniqueness are enforced here.
 */
export class DeviceRegistry {
  private entries = new Map<string, RegistryEntry>();
  private detachers = new Map<string, Array<() => void>>();
  private emit: AttributesListener | null = null;
  private started = false;

  private settings: RegistrySettings;
  private createClient: (config: DeviceConfig) => DeviceClient;

  constructor(options: RegistryOptions) {
    this.settings = options.settings;
    this.createClient =
      options.createClient ??
      ((config) => new NaimClient(config.host, config.port, options.settings.requestTimeoutMs, config.apiPath));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Route attribute changes of every current and future entity to `emit`. */
  setAttributesListener(emit: AttributesListener): void {
    this.emit = emit;
    for (const entry of this.entries.values()) this.attach(entry);
  }

  addDevice(config: DeviceConfig): RegistryEntry {
    const parsed = deviceConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigInvalidError(`Invalid device config: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
    }
    const device = parsed.data;

    const existing = this.entries.get(device.id);
    if (existing) {
      throw new DuplicateDeviceError(`${device.host}:${device.port}`, existing.config.id);
    }
    const key = addressKey(device.host, device.port);
    for (const entry of this.entries.values()) {
      if (addressKey(entry.config.host, entry.config.port) === key) {
        throw new DuplicateDeviceError(`${device.host}:${device.port}`, entry.config.id);
      }
    }
    if (this.entries.size >= MAX_DEVICES) {
      throw new CapacityExceededError(MAX_DEVICES);
    }

    const client = this.createClient(device);
    const poller = new DevicePoller(device.id, client, {
      intervalMs: this.settings.pollIntervalMs,
      timeoutMs: this.settings.requestTimeoutMs,
      failureThreshold: this.settings.failureThreshold,
    });
    const mediaPlayer = new MediaPlayerEntity(device, client, poller, { volumeStep: this.settings.volumeStep });
    const remote = new RemoteEntity(device, poller, mediaPlayer);
    const entry: RegistryEntry = { config: device, client, poller, mediaPlayer, remote };

    this.entries.set(device.id, entry);
    this.attach(entry);
    if (this.started) poller.start();

    console.info(`[Registry] Added ${device.id} (${device.host}:${device.port})`);
    return entry;
  }

  removeDevice(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;

    entry.poller.stop();
    for (const detach of this.detachers.get(id) ?? []) detach();
    this.detachers.delete(id);
    this.entries.delete(id);

    console.info(`[Registry] Removed ${id}`);
    return true;
  }

  getState(id: string): DeviceSnapshot | undefined {
    return this.entries.get(id)?.poller.snapshot;
  }

  listDevices(): DeviceConfig[] {
    return [...this.entries.values()].map((e) => e.config);
  }

  get(id: string): RegistryEntry | undefined {
    return this.entries.get(id);
  }

  findByAddress(host: string, port: number): RegistryEntry | undefined {
    const key = addressKey(host, port);
    return [...this.entries.values()].find((e) => addressKey(e.config.host, e.config.port) === key);
  }

  findEntity(entityId: string): EntityHandle | undefined {
    for (const entry of this.entries.values()) {
      if (entry.mediaPlayer.entityId === entityId) {
        return { kind: "media_player", entry, entity: entry.mediaPlayer };
      }
      if (entry.remote.entityId === entityId) {
        return { kind: "remote", entry, entity: entry.remote };
      }
    }
    return undefined;
  }

  entities(): EntityRegistration[] {
    return [...this.entries.values()].flatMap((e) => [e.mediaPlayer.registration(), e.remote.registration()]);
  }

  /** Start polling every device; devices added later start immediately. */
  start(): void {
    this.started = true;
    for (const entry of this.entries.values()) entry.poller.start();
  }

  shutdown(): void {
    this.started = false;
    for (const id of [...this.entries.keys()]) this.removeDevice(id);
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private attach(entry: RegistryEntry): void {
    const emit = this.emit;
    if (!emit) return;
    for (const detach of this.detachers.get(entry.config.id) ?? []) detach();
    this.detachers.set(entry.config.id, [entry.mediaPlayer.attach(emit), entry.remote.attach(emit)]);
  }
}
