// ── Device Config ──────────────────────────────────────────────────────────

export const DEFAULT_PORT = 15081;
export const MAX_DEVICES = 10;

export interface DeviceConfig {
  id: string;
  name: string;
  host: string;
  port: number;
  enabled: boolean;
  /** API path prefix found at setup, e.g. `/naim`; absent for the root API. */
  apiPath?: string;
}

// ── Naim API Responses ─────────────────────────────────────────────────────

/**
 * Raw payloads are kept loose: firmware versions drop or rename fields
 * depending on the active source, so every key is optional and untyped.
 */
export type RawPayload = Record<string, unknown>;

/** One child of `/inputs`: `name`, `ussi` ("inputs/ana1"), `selectable` and `disabled` ("0"/"1"). */
export type RawInput = Record<string, unknown>;

// ── Canonical State ────────────────────────────────────────────────────────

export type PowerState = "on" | "standby" | "unknown";
export type PlaybackState = "playing" | "paused" | "stopped" | "buffering" | "unknown";
export type RepeatMode = "off" | "one" | "all";

export interface TrackInfo {
  title: string;
  artist: string;
  album: string;
  artworkUrl: string;
  positionSeconds: number;
  durationSeconds: number;
}

export interface SourceOption {
  /** Canonical source id, as reported in `DeviceState.source`. */
  id: string;
  /** The device's own input id (the last segment of its ussi). */
  vendorId: string;
  label: string;
  selectable: boolean;
}

export interface DeviceInfo {
  model: string;
  hostname: string;
}

export interface DeviceState {
  power: PowerState;
  playback: PlaybackState;
  source: string | null;
  volume: number | null;
  muted: boolean;
  track: TrackInfo | null;
  repeat: RepeatMode;
  shuffle: boolean;
  lastUpdated: number | null;
  reachable: boolean;
  sources: readonly SourceOption[];
  device: DeviceInfo | null;
}

export type DeviceSnapshot = Readonly<DeviceState>;

export const INITIAL_STATE: DeviceSnapshot = Object.freeze({
  power: "unknown",
  playback: "unknown",
  source: null,
  volume: null,
  muted: false,
  track: null,
  repeat: "off",
  shuffle: false,
  lastUpdated: null,
  reachable: true,
  sources: Object.freeze([]),
  device: null,
});

// ── Client Commands ────────────────────────────────────────────────────────

export type TransportCommand = "play" | "pause" | "stop" | "next" | "previous";

export type DeviceCommand =
  | { kind: TransportCommand }
  | { kind: "set_volume"; volume: number }
  | { kind: "set_mute"; muted: boolean }
  | { kind: "set_source"; source: string }
  | { kind: "set_power"; on: boolean }
  | { kind: "set_repeat"; repeat: RepeatMode }
  | { kind: "set_shuffle"; shuffle: boolean };

export type CommandKind = DeviceCommand["kind"];

/** Seam between the poller/entities and the HTTP client; tests substitute fakes. */
export interface DeviceClient {
  readonly baseUrl: string;
  fetchNowPlaying(signal?: AbortSignal): Promise<RawPayload>;
  fetchPower(signal?: AbortSignal): Promise<RawPayload>;
  fetchLevels(signal?: AbortSignal): Promise<RawPayload>;
  fetchInputs(signal?: AbortSignal): Promise<RawInput[]>;
  fetchSystemInfo(signal?: AbortSignal): Promise<RawPayload>;
  /** Finds the path prefix the device serves its API under ("" for none). */
  detectApiPath(signal?: AbortSignal): Promise<string>;
  sendCommand(command: DeviceCommand, signal?: AbortSignal): Promise<RawPayload>;
}
