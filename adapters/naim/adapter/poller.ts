import type { DeviceClient, DeviceInfo, DeviceSnapshot, DeviceState, RawPayload, SourceOption } from "./types.js";
import { INITIAL_STATE } from "./types.js";
import { normalize, normalizePower } from "./normalizer.js";
import { parseInputs } from "./sources.js";
import { describeError } from "./errors.js";

export type StateListener = (state: DeviceSnapshot, previous: DeviceSnapshot) => void | Promise<void>;

export interface PollerOptions {
  intervalMs?: number;
  /** Upper bound for one tick's requests */
  timeoutMs?: number;
  failureThreshold?: number;
  now?: () => number;
}

function freezeState(state: DeviceState): DeviceSnapshot {
  return Object.freeze({
    ...state,
    track: state.track ? Object.freeze({ ...state.track }) : null,
    sources: Object.freeze(state.sources.map((s) => Object.freeze({ ...s }))),
    device: state.device ? Object.freeze({ ...state.device }) : null,
  });
}

/** Everything except lastUpdated, in a fixed order. */
function fingerprint(s: DeviceSnapshot): string {
  return JSON.stringify([
    s.power,
    s.playback,
    s.source,
    s.volume,
    s.muted,
    s.track,
    s.repeat,
    s.shuffle,
    s.reachable,
    s.sources,
    s.device,
  ]);
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function parseDeviceInfo(raw: RawPayload): DeviceInfo {
  return {
    model: str(raw.model) || str(raw.hardwareType) || str(raw.productName),
    hostname: str(raw.hostname) || str(raw.name) || str(raw.friendlyName),
  };
}

/**
 * Reconciliation loop for one device. The poller is the only writer of the
 * device's state; listeners get every new snapshot in poll order.
 */
export class DevicePoller {
  private state: DeviceSnapshot = INITIAL_STATE;
  private listeners: StateListener[] = [];
  private failures = 0;
  private needsMetadata = true;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private rerun = false;
  private started = false;
  private stopped = false;

  private intervalMs: number;
  private timeoutMs: number;
  private failureThreshold: number;
  private now: () => number;

  constructor(
    readonly deviceId: string,
    private client: DeviceClient,
    options: PollerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 5_000;
    this.timeoutMs = options.timeoutMs ?? 3_000;
    this.failureThreshold = options.failureThreshold ?? 3;
    this.now = options.now ?? Date.now;
  }

  get snapshot(): DeviceSnapshot {
    return this.state;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get running(): boolean {
    return this.started && !this.stopped;
  }

  /** Returns an unsubscribe function. */
  onChange(listener: StateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Starts the loop with an immediate first tick. */
  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    void this.runTick();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    this.controller = null;
    this.listeners = [];
  }

  /**
   * Runs an out-of-cycle tick. While a tick is in flight the request is
   * coalesced into one follow-up tick; the returned promise settles after it.
   */
  requestPoll(): Promise<void> {
    return this.runTick();
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private runTick(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    if (this.inFlight) {
      this.rerun = true;
      return this.inFlight;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.inFlight = (async () => {
      try {
        do {
          this.rerun = false;
          await this.tick();
        } while (this.rerun && !this.stopped);
      } finally {
        this.inFlight = null;
        this.scheduleNext();
      }
    })();
    return this.inFlight;
  }

  private scheduleNext(): void {
    if (!this.started || this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runTick();
    }, this.intervalMs);
  }

  private tickSignal(controller: AbortController): AbortSignal {
    return AbortSignal.any([controller.signal, AbortSignal.timeout(this.timeoutMs)]);
  }

  private async tick(): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;
    try {
      await this.reconcile(controller);
    } catch (err) {
      // Listener errors never reach this point; publish() contains them.
      console.error(`[Poller ${this.deviceId}] Tick failed:`, describeError(err));
    } finally {
      if (this.controller === controller) this.controller = null;
    }
  }

  private async reconcile(controller: AbortController): Promise<void> {
    const signal = this.tickSignal(controller);
    const [power, nowPlaying, levels] = await Promise.allSettled([
      this.client.fetchPower(signal),
      this.client.fetchNowPlaying(signal),
      this.client.fetchLevels(signal),
    ]);
    if (this.stopped || controller.signal.aborted) return;

    if (power.status === "rejected") {
      this.recordFailure(power.reason);
      return;
    }

    // Devices answer /nowplaying with 503 while in standby.
    let rawNowPlaying: RawPayload | null = null;
    if (nowPlaying.status === "fulfilled") {
      rawNowPlaying = nowPlaying.value;
    } else if (normalizePower(power.value) !== "standby") {
      this.recordFailure(nowPlaying.reason);
      return;
    }

    const rawLevels = levels.status === "fulfilled" ? levels.value : null;
    if (levels.status === "rejected") {
      console.debug(`[Poller ${this.deviceId}] Levels unavailable:`, describeError(levels.reason));
    }

    const recovered = this.failures > 0 || !this.state.reachable;
    if (recovered) {
      console.info(`[Poller ${this.deviceId}] Device reachable again after ${this.failures} failed poll(s)`);
      this.failures = 0;
      this.needsMetadata = true;
    }

    const previous = this.state;
    let { sources, device } = previous;
    if (this.needsMetadata) {
      const metadata = await this.fetchMetadata(signal);
      if (this.stopped || controller.signal.aborted) return;
      if (metadata.sources) sources = metadata.sources;
      if (metadata.device) device = metadata.device;
      this.needsMetadata = metadata.sources === null;
    }

    const normalized = normalize(rawNowPlaying, power.value, rawLevels);
    // Readings without volume or mute keep the last-known value.
    const hasMute = rawLevels?.mute !== undefined || rawNowPlaying?.mute !== undefined;

    const next = freezeState({
      ...normalized,
      volume: normalized.volume ?? previous.volume,
      muted: hasMute ? normalized.muted : previous.muted,
      lastUpdated: this.now(),
      reachable: true,
      sources,
      device,
    });

    if (recovered || fingerprint(next) !== fingerprint(previous)) {
      this.publish(next);
    } else {
      this.state = next;
    }
  }

  /** Shares the tick's signal, so metadata never extends the tick's deadline. */
  private async fetchMetadata(
    signal: AbortSignal,
  ): Promise<{ sources: SourceOption[] | null; device: DeviceInfo | null }> {
    const [inputs, system] = await Promise.allSettled([
      this.client.fetchInputs(signal),
      this.client.fetchSystemInfo(signal),
    ]);
    if (inputs.status === "rejected") {
      console.debug(`[Poller ${this.deviceId}] Inputs unavailable:`, describeError(inputs.reason));
    }
    return {
      sources: inputs.status === "fulfilled" ? parseInputs(inputs.value) : null,
      device: system.status === "fulfilled" ? parseDeviceInfo(system.value) : null,
    };
  }

  private recordFailure(reason: unknown): void {
    this.failures++;
    console.warn(
      `[Poller ${this.deviceId}] Poll failed (${this.failures}/${this.failureThreshold}):`,
      describeError(reason),
    );

    // Last-known power and playback are kept; only reachability flips.
    if (this.failures >= this.failureThreshold && this.state.reachable) {
      this.publish(freezeState({ ...this.state, reachable: false }));
    }
  }

  private publish(next: DeviceSnapshot): void {
    const previous = this.state;
    this.state = next;
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(next, previous);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            console.error(`[Poller ${this.deviceId}] Listener failed:`, describeError(err));
          });
        }
      } catch (err) {
        console.error(`[Poller ${this.deviceId}] Listener failed:`, describeError(err));
      }
    }
  }
}
