import { z } from "zod";
import { CommandError } from "@naim-bridge/adapter-sdk";
import type { AttributesListener, EntityAttributes, EntityRegistration } from "@naim-bridge/adapter-sdk";
import type { DeviceConfig, DeviceSnapshot } from "./types.js";
import type { DevicePoller } from "./poller.js";
import type { MediaPlayerEntity } from "./media-player.js";
import { parseParams } from "./commands.js";

type RemoteAction =
  | { type: "media"; command: string; params?: Record<string, unknown> }
  | { type: "noop" }
  | { type: "unsupported" };

const media = (command: string, params?: Record<string, unknown>): RemoteAction => ({ type: "media", command, params });
const source = (id: string): RemoteAction => media("select_source", { source: id });
const NOOP: RemoteAction = { type: "noop" };
const UNSUPPORTED: RemoteAction = { type: "unsupported" };

/** Button commands, resolved through the media player entity. */
export const REMOTE_COMMANDS: Readonly<Record<string, RemoteAction>> = {
  POWER_ON: media("on"),
  POWER_OFF: media("off"),
  POWER_TOGGLE: media("toggle"),
  VOLUME_UP: media("volume_up"),
  VOLUME_DOWN: media("volume_down"),
  MUTE_TOGGLE: media("mute_toggle"),
  MUTE: media("mute"),
  UNMUTE: media("unmute"),
  PLAY: media("play"),
  PAUSE: media("pause"),
  PLAY_PAUSE: media("play_pause"),
  STOP: media("stop"),
  NEXT: media("next"),
  PREVIOUS: media("previous"),
  FORWARD: media("next"),
  REWIND: media("previous"),
  // navigation buttons have no device counterpart
  UP: NOOP,
  DOWN: NOOP,
  LEFT: NOOP,
  RIGHT: NOOP,
  OK: NOOP,
  BACK: NOOP,
  PAGE_UP: NOOP,
  PAGE_DOWN: NOOP,
  SOURCE_ANA1: source("analog_1"),
  SOURCE_DIG1: source("digital_1"),
  SOURCE_DIG2: source("digital_2"),
  SOURCE_DIG3: source("digital_3"),
  SOURCE_HDMI: source("hdmi"),
  SOURCE_RADIO: source("radio"),
  SOURCE_BLUETOOTH: source("bluetooth"),
  SOURCE_SPOTIFY: source("spotify"),
  SOURCE_TIDAL: source("tidal"),
  SOURCE_QOBUZ: source("qobuz"),
  SOURCE_USB: source("usb"),
  SOURCE_AIRPLAY: source("airplay"),
  SOURCE_GCAST: source("chromecast"),
  SOURCE_UPNP: source("upnp"),
  SOURCE_PLAYQUEUE: source("playqueue"),
  SOURCE_FILES: source("files"),
  BALANCE_LEFT: UNSUPPORTED,
  BALANCE_RIGHT: UNSUPPORTED,
  BALANCE_CENTER: UNSUPPORTED,
};

const sendCmdParams = z.object({ command: z.string().min(1) });

export function remoteAttributes(state: DeviceSnapshot): EntityAttributes {
  return { state: state.reachable ? "ON" : "UNAVAILABLE" };
}

export class RemoteEntity {
  readonly entityId: string;
  private lastState: string | null = null;

  constructor(
    private config: DeviceConfig,
    private poller: DevicePoller,
    private mediaPlayer: MediaPlayerEntity,
  ) {
    this.entityId = `${config.id}_remote`;
  }

  attach(emit: AttributesListener): () => void {
    return this.poller.onChange((state) => {
      const attributes = remoteAttributes(state);
      const serialized = JSON.stringify(attributes);
      if (serialized === this.lastState) return;
      this.lastState = serialized;
      emit(this.entityId, attributes);
    });
  }

  registration(): EntityRegistration {
    return {
      entityId: this.entityId,
      entityType: "remote",
      displayName: `${this.config.name} Remote`,
      deviceId: this.config.id,
      features: ["send_cmd"],
      commands: {
        send_cmd: { command: { type: "string", values: Object.keys(REMOTE_COMMANDS) } },
      },
      simpleCommands: Object.keys(REMOTE_COMMANDS),
      attributes: remoteAttributes(this.poller.snapshot),
    };
  }

  async execute(command: string, params: Record<string, unknown>): Promise<void> {
    if (command !== "send_cmd") {
      throw new CommandError("not_implemented", `Unknown remote command: ${command}`);
    }

    const { command: button } = parseParams(sendCmdParams, params, command);
    const key = button.toUpperCase();
    const action = Object.hasOwn(REMOTE_COMMANDS, key) ? REMOTE_COMMANDS[key] : undefined;

    if (!action) {
      throw new CommandError("not_implemented", `Unknown remote button: ${button}`);
    }

    switch (action.type) {
      case "media":
        return this.mediaPlayer.execute(action.command, action.params ?? {});
      case "noop":
        return;
      case "unsupported":
        throw new CommandError("not_implemented", `${key} is not supported by the device API`);
    }
  }
}
