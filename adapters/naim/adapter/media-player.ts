import { z } from "zod";
import { CommandError } from "@naim-bridge/adapter-sdk";
import type { AttributesListener, EntityAttributes, EntityRegistration } from "@naim-bridge/adapter-sdk";
import type { DeviceClient, DeviceCommand, DeviceConfig, DeviceSnapshot, SourceOption } from "./types.js";
import type { DevicePoller } from "./poller.js";
import { clampVolume } from "./normalizer.js";
import { canonicalSource, sourceLabel, vendorSourceId } from "./sources.js";
import { parseParams, sendAndRefresh, toCommandError } from "./commands.js";

export const MEDIA_PLAYER_FEATURES = [
  "on_off",
  "toggle",
  "play_pause",
  "stop",
  "next",
  "previous",
  "volume",
  "volume_up_down",
  "mute_toggle",
  "mute",
  "unmute",
  "select_source",
  "repeat",
  "shuffle",
  "media_position",
  "media_duration",
  "media_title",
  "media_artist",
  "media_album",
  "media_image_url",
];

const volumeParams = z.object({ volume: z.number().min(0).max(100) });
const sourceParams = z.object({ source: z.string().min(1) });
const repeatParams = z.object({
  repeat: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["off", "one", "all"])),
});
const shuffleParams = z.object({ shuffle: z.boolean() });

export type MediaPlayerState = "ON" | "OFF" | "PLAYING" | "PAUSED" | "BUFFERING" | "UNKNOWN";

export function mediaPlayerState(state: DeviceSnapshot): MediaPlayerState {
  if (state.power === "standby") return "OFF";
  switch (state.playback) {
    case "playing":
      return "PLAYING";
    case "paused":
      return "PAUSED";
    case "buffering":
      return "BUFFERING";
    case "stopped":
      return "ON";
    case "unknown":
      return state.power === "on" ? "ON" : "UNKNOWN";
  }
}

function currentSourceLabel(state: DeviceSnapshot): string {
  if (!state.source) return "";
  return state.sources.find((s) => s.id === state.source)?.label ?? sourceLabel(state.source);
}

/** Host-facing attributes for the media player entity. */
export function mediaPlayerAttributes(state: DeviceSnapshot): EntityAttributes {
  const track = state.track;
  return {
    state: mediaPlayerState(state),
    available: state.reachable,
    volume: state.volume,
    muted: state.muted,
    media_position: track?.positionSeconds ?? 0,
    media_duration: track?.durationSeconds ?? 0,
    media_title: track?.title ?? "",
    media_artist: track?.artist ?? "",
    media_album: track?.album ?? "",
    media_image_url: track?.artworkUrl ?? "",
    source: currentSourceLabel(state),
    source_list: state.sources.filter((s) => s.selectable).map((s) => s.label),
    repeat: state.repeat.toUpperCase(),
    shuffle: state.shuffle,
  };
}

export interface MediaPlayerOptions {
  volumeStep: number;
}

/**
 * Media player entity for one device. Reads the poller's snapshot and turns
 * host commands into device commands; it never writes state itself.
 */
export class MediaPlayerEntity {
  readonly entityId: string;
  private lastEmitted: string | null = null;

  constructor(
    private config: DeviceConfig,
    private client: DeviceClient,
    private poller: DevicePoller,
    private options: MediaPlayerOptions,
  ) {
    this.entityId = config.id;
  }

  /** Forward attribute changes to `emit`. Returns a detach function. */
  attach(emit: AttributesListener): () => void {
    return this.poller.onChange((state) => {
      const attributes = mediaPlayerAttributes(state);
      const serialized = JSON.stringify(attributes);
      if (serialized === this.lastEmitted) return;
      this.lastEmitted = serialized;
      emit(this.entityId, attributes);
    });
  }

  registration(): EntityRegistration {
    return {
      entityId: this.entityId,
      entityType: "media_player",
      displayName: this.config.name,
      deviceId: this.config.id,
      features: [...MEDIA_PLAYER_FEATURES],
      commands: {
        on: {},
        off: {},
        toggle: {},
        play_pause: {},
        play: {},
        pause: {},
        stop: {},
        next: {},
        previous: {},
        seek: { media_position: { type: "number", description: "Position in seconds", min: 0 } },
        volume: { volume: { type: "number", min: 0, max: 100, description: "Absolute volume" } },
        volume_up: {},
        volume_down: {},
        mute_toggle: {},
        mute: {},
        unmute: {},
        select_source: { source: { type: "string", description: "Source name from source_list" } },
        repeat: { repeat: { type: "string", values: ["OFF", "ONE", "ALL"] } },
        shuffle: { shuffle: { type: "boolean" } },
      },
      attributes: mediaPlayerAttributes(this.poller.snapshot),
    };
  }

  async execute(command: string, params: Record<string, unknown>): Promise<void> {
    const state = this.poller.snapshot;
    switch (command) {
      case "on":
        return this.send({ kind: "set_power", on: true });
      case "off":
        return this.send({ kind: "set_power", on: false });
      case "toggle":
        return this.send({ kind: "set_power", on: state.power !== "on" });
      case "play_pause":
        return this.send({ kind: state.playback === "playing" ? "pause" : "play" });
      case "play":
      case "pause":
      case "stop":
      case "next":
      case "previous":
        return this.send({ kind: command });
      case "seek":
        throw new CommandError("not_implemented", "Seeking is not supported by the device API");
      case "volume": {
        const { volume } = parseParams(volumeParams, params, command);
        return this.send({ kind: "set_volume", volume: clampVolume(volume) });
      }
      case "volume_up":
        return this.stepVolume(this.options.volumeStep);
      case "volume_down":
        return this.stepVolume(-this.options.volumeStep);
      case "mute_toggle":
        return this.send({ kind: "set_mute", muted: !state.muted });
      case "mute":
        return this.send({ kind: "set_mute", muted: true });
      case "unmute":
        return this.send({ kind: "set_mute", muted: false });
      case "select_source": {
        const { source } = parseParams(sourceParams, params, command);
        return this.send({ kind: "set_source", source: this.resolveSource(source, state.sources) });
      }
      case "repeat": {
        const { repeat } = parseParams(repeatParams, params, command);
        return this.send({ kind: "set_repeat", repeat });
      }
      case "shuffle": {
        const { shuffle } = parseParams(shuffleParams, params, command);
        return this.send({ kind: "set_shuffle", shuffle });
      }
      default:
        throw new CommandError("not_implemented", `Unknown media player command: ${command}`);
    }
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private send(command: DeviceCommand): Promise<void> {
    return sendAndRefresh(this.client, this.poller, command);
  }

  private async stepVolume(delta: number): Promise<void> {
    let current = this.poller.snapshot.volume;
    if (current === null) {
      try {
        const levels = await this.client.fetchLevels();
        current = typeof levels.volume === "number" ? levels.volume : Number(levels.volume);
      } catch (err) {
        throw toCommandError(err);
      }
      if (!Number.isFinite(current)) {
        throw new CommandError("server_error", "Current volume is unknown");
      }
    }
    await this.send({ kind: "set_volume", volume: clampVolume(current + delta) });
  }

  /**
   * Match a host-supplied source against the device's input list by label,
   * canonical id or vendor id. Without an input list the value is sent as is.
   */
  private resolveSource(requested: string, sources: readonly SourceOption[]): string {
    const wanted = requested.trim().toLowerCase();
    const match = sources.find(
      (s) => s.label.toLowerCase() === wanted || s.id === wanted || s.vendorId.toLowerCase() === wanted,
    );

    if (match) {
      if (!match.selectable) {
        throw new CommandError("rejected", `Source ${match.label} is not selectable`);
      }
      return match.id;
    }
    if (sources.length > 0) {
      throw new CommandError("bad_request", `Unknown source: ${requested}`);
    }
    return canonicalSource(vendorSourceId(requested.trim()));
  }
}
