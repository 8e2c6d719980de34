import type { DeviceClient, DeviceCommand, RawInput, RawPayload } from "./types.js";
import { DeviceUnreachableError } from "./errors.js";

/** A scripted answer computed per call. */
export class Respond<T> {
  constructor(readonly run: (signal?: AbortSignal) => Promise<T>) {}
}

export const respond = <T>(run: (signal?: AbortSignal) => Promise<T>): Respond<T> => new Respond(run);

type Answer<T> = T | Error | Respond<T>;

async function answer<T>(value: Answer<T>, signal?: AbortSignal): Promise<T> {
  if (value instanceof Respond) return value.run(signal);
  if (value instanceof Error) throw value;
  return value;
}

/** Never settles until the signal aborts. */
export function hang<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new DeviceUnreachableError("http://fake", "aborted")));
  });
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const unreachable = (): DeviceUnreachableError => new DeviceUnreachableError("http://fake", "connect ECONNREFUSED");

/** Scriptable in-memory `DeviceClient`. */
export class FakeClient implements DeviceClient {
  baseUrl = "http://fake:15081";

  power: Answer<RawPayload> = { system: "on" };
  nowPlaying: Answer<RawPayload> = {
    transportState: "2",
    source: "inputs/ana1",
    title: "Take Five",
    artist: "Dave Brubeck",
    album: "Time Out",
  };
  levels: Answer<RawPayload> = { volume: 40, mute: "0" };
  inputs: Answer<RawInput[]> = [
    { name: "Analogue 1", ussi: "inputs/ana1", selectable: "1" },
    { name: "Spotify", ussi: "inputs/spotify", selectable: "1" },
    { name: "HDMI", ussi: "inputs/hdmi", selectable: "0" },
  ];
  system: Answer<RawPayload> = { model: "Uniti Atom", hostname: "Living Room" };
  commandResult: Answer<RawPayload> = {};
  apiPath: Answer<string> = "";

  readonly calls = { power: 0, nowPlaying: 0, levels: 0, inputs: 0, system: 0 };
  readonly commands: DeviceCommand[] = [];
  readonly signals: AbortSignal[] = [];

  fetchPower(signal?: AbortSignal): Promise<RawPayload> {
    this.calls.power++;
    if (signal) this.signals.push(signal);
    return answer(this.power, signal);
  }

  fetchNowPlaying(signal?: AbortSignal): Promise<RawPayload> {
    this.calls.nowPlaying++;
    return answer(this.nowPlaying, signal);
  }

  fetchLevels(signal?: AbortSignal): Promise<RawPayload> {
    this.calls.levels++;
    return answer(this.levels, signal);
  }

  fetchInputs(signal?: AbortSignal): Promise<RawInput[]> {
    this.calls.inputs++;
    return answer(this.inputs, signal);
  }

  fetchSystemInfo(signal?: AbortSignal): Promise<RawPayload> {
    this.calls.system++;
    return answer(this.system, signal);
  }

  detectApiPath(signal?: AbortSignal): Promise<string> {
    return answer(this.apiPath, signal);
  }

  sendCommand(command: DeviceCommand, signal?: AbortSignal): Promise<RawPayload> {
    this.commands.push(command);
    return answer(this.commandResult, signal);
  }
}
