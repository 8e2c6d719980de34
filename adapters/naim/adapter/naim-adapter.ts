import { CommandError } from "@naim-bridge/adapter-sdk";
import type {
  Adapter,
  AttributesListener,
  DiscoverResult,
  RegistrationResult,
  SetupResult,
} from "@naim-bridge/adapter-sdk";
import type { DeviceClient, DeviceConfig } from "./types.js";
import type { NaimSettings } from "./config.js";
import { loadSettings } from "./config.js";
import { ConfigStore } from "./config-store.js";
import { DeviceRegistry } from "./registry.js";
import { SetupFlow, type DeviceAddress } from "./setup.js";
import { NaimClient } from "./naim-client.js";
import { describeError } from "./errors.js";

export interface NaimAdapterDeps {
  settings?: NaimSettings;
  store?: ConfigStore;
  /** Client factory; the HTTP client unless overridden. */
  createClient?: (address: DeviceAddress) => DeviceClient;
}

export class NaimAdapter implements Adapter {
  private settings: NaimSettings;
  private store: ConfigStore;
  private registry: DeviceRegistry;
  private setupFlow: SetupFlow;

  constructor(config: Record<string, unknown>, deps: NaimAdapterDeps = {}) {
    this.settings = deps.settings ?? loadSettings(config);
    this.store = deps.store ?? new ConfigStore(this.settings.configDir);

    const timeoutMs = this.settings.requestTimeoutMs;
    const createClient =
      deps.createClient ?? ((address: DeviceAddress) => new NaimClient(address.host, address.port, timeoutMs, address.apiPath));

    this.registry = new DeviceRegistry({
      settings: this.settings,
      createClient: (device: DeviceConfig) => createClient({ host: device.host, port: device.port, apiPath: device.apiPath }),
    });
    this.setupFlow = new SetupFlow({ registry: this.registry, store: this.store, createClient });
  }

  async register(): Promise<RegistrationResult> {
    const configs = this.store.load();
    for (const config of configs) {
      if (!config.enabled) {
        console.info(`[Naim] Skipping disabled device ${config.id}`);
        continue;
      }
      try {
        this.registry.addDevice(config);
      } catch (err) {
        console.warn(`[Naim] Could not load device ${config.id}:`, describeError(err));
      }
    }
    console.info(`[Naim] Registered ${this.registry.size} device(s) from ${this.store.path}`);
    return { entities: this.registry.entities() };
  }

  async subscribe(cb: AttributesListener): Promise<void> {
    this.registry.setAttributesListener(cb);
    this.registry.start();
  }

  async execute(entityId: string, command: string, params: Record<string, unknown>): Promise<void> {
    const handle = this.registry.findEntity(entityId);
    if (!handle) {
      throw new CommandError("not_found", `Unknown entity: ${entityId}`);
    }
    console.debug(`[Naim] ${entityId} ← ${command} ${JSON.stringify(params)}`);
    await handle.entity.execute(command, params);
  }

  async setup(params: Record<string, unknown>): Promise<SetupResult> {
    return this.setupFlow.run(params);
  }

  async discover(params: Record<string, unknown>): Promise<DiscoverResult> {
    return this.setupFlow.discover(params);
  }

  /** Healthy while at least one device answers, or when none is configured. */
  async ping(): Promise<boolean> {
    const devices = this.registry.listDevices();
    if (devices.length === 0) return true;
    return devices.some((d) => this.registry.getState(d.id)?.reachable === true);
  }

  async destroy(): Promise<void> {
    this.registry.shutdown();
  }
}
