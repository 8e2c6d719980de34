import type {
  DeviceState,
  PlaybackState,
  PowerState,
  RawPayload,
  RepeatMode,
  TrackInfo,
} from "./types.js";
import { canonicalSource, vendorSourceId } from "./sources.js";

/** The poll-derived part of `DeviceState`; the poller fills in the rest. */
export type NormalizedState = Pick<
  DeviceState,
  "power" | "playback" | "source" | "volume" | "muted" | "track" | "repeat" | "shuffle"
>;

/** transportState values reported by /nowplaying */
const TRANSPORT_STATE_MAP: Record<string, PlaybackState> = {
  "0": "stopped",
  "1": "paused",
  "2": "playing",
  "3": "buffering",
};

const STATUS_MAP: Record<string, PlaybackState> = {
  stopped: "stopped",
  stop: "stopped",
  paused: "paused",
  pause: "paused",
  playing: "playing",
  play: "playing",
  buffering: "buffering",
  loading: "buffering",
};

const REPEAT_MAP: Record<string, RepeatMode> = {
  "0": "off",
  "1": "one",
  "2": "all",
  off: "off",
  one: "one",
  all: "all",
};

const STANDBY_VALUES = new Set(["standby", "lona", "off", "networkstandby"]);

function lookup<T>(map: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

function str(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function num(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function flag(value: unknown): boolean {
  return value === true || value === 1 || value === "1" || value === "true" || value === "on";
}

export function clampVolume(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function normalizePower(raw: RawPayload | null): PowerState {
  if (!raw) return "unknown";
  const values = [raw.state, raw.system, raw.power]
    .map(str)
    .filter((v): v is string => v !== null)
    .map((v) => v.toLowerCase());
  if (values.length === 0) return "unknown";
  if (values.includes("on")) return "on";
  if (values.some((v) => STANDBY_VALUES.has(v))) return "standby";
  return "unknown";
}

export function normalizePlayback(raw: RawPayload | null): PlaybackState {
  if (!raw) return "unknown";
  const transport = str(raw.transportState);
  const fromTransport = transport !== null ? lookup(TRANSPORT_STATE_MAP, transport) : undefined;
  if (fromTransport) return fromTransport;
  const status = str(raw.status);
  if (status !== null) return lookup(STATUS_MAP, status.toLowerCase()) ?? "unknown";
  return "unknown";
}

export function normalizeSource(raw: RawPayload | null): string | null {
  if (!raw) return null;
  const value = str(raw.source) ?? str(raw.input);
  if (!value) return null;
  const vendorId = vendorSourceId(value);
  // "inputs/none" is reported when nothing is selected
  if (!vendorId || vendorId === "none") return null;
  return canonicalSource(vendorId);
}

function normalizeTrack(raw: RawPayload): TrackInfo | null {
  const title = str(raw.title) ?? "";
  const artist = str(raw.artist) ?? "";
  const album = str(raw.album) ?? "";
  const station = str(raw.station) ?? "";
  const artworkUrl = str(raw.artwork) ?? str(raw.artworkSource) ?? "";
  if (!title && !artist && !album && !station && !artworkUrl) return null;

  // Positions are reported in milliseconds.
  const position = num(raw.transportPosition);
  const duration = num(raw.duration);
  return {
    title: title || station,
    artist: artist || (title ? station : ""),
    album,
    artworkUrl,
    positionSeconds: position !== null && position > 0 ? Math.floor(position / 1000) : 0,
    durationSeconds: duration !== null && duration > 0 ? Math.floor(duration / 1000) : 0,
  };
}

/**
 * Map raw /nowplaying, /power and /levels/room payloads to canonical state.
 * Missing keys fall back to unknown/null; nothing here throws.
 */
export function normalize(
  nowPlaying: RawPayload | null,
  power: RawPayload | null,
  levels: RawPayload | null = null,
): NormalizedState {
  let powerState = normalizePower(power);
  if (powerState === "unknown") powerState = normalizePower(nowPlaying);

  let playback = normalizePlayback(nowPlaying);
  if (playback === "unknown" && powerState === "standby") playback = "stopped";

  const rawVolume = num(levels?.volume) ?? num(nowPlaying?.volume);
  const muteValue = levels?.mute ?? nowPlaying?.mute;

  const repeat = nowPlaying ? str(nowPlaying.repeat) : null;

  return {
    power: powerState,
    playback,
    source: normalizeSource(nowPlaying),
    volume: rawVolume === null ? null : clampVolume(rawVolume),
    muted: flag(muteValue),
    track: nowPlaying ? normalizeTrack(nowPlaying) : null,
    repeat: repeat !== null ? (lookup(REPEAT_MAP, repeat.toLowerCase()) ?? "off") : "off",
    shuffle: nowPlaying ? flag(nowPlaying.shuffle) : false,
  };
}
