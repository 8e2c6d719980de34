import { describe, it, expect } from "vitest";
import { clampVolume, normalize, normalizePlayback, normalizePower, normalizeSource } from "./normalizer.js";

describe("normalize", () => {
  it("maps a combined power/status/input payload", () => {
    const raw = { power: "on", status: "playing", input: "ana1" };
    const state = normalize(raw, raw);

    expect(state.power).toBe("on");
    expect(state.playback).toBe("playing");
    expect(state.source).toBe("analog_1");
  });

  it("reads the usual firmware payloads", () => {
    const state = normalize(
      {
        transportState: "2",
        source: "inputs/spotify",
        title: "Blue Train",
        artist: "John Coltrane",
        album: "Blue Train",
        artwork: "http://img.test/cover.jpg",
        transportPosition: 61_500,
        duration: 643_000,
        repeat: "2",
        shuffle: "1",
      },
      { system: "on" },
      { volume: "42", mute: "0" },
    );

    expect(state).toEqual({
      power: "on",
      playback: "playing",
      source: "spotify",
      volume: 42,
      muted: false,
      track: {
        title: "Blue Train",
        artist: "John Coltrane",
        album: "Blue Train",
        artworkUrl: "http://img.test/cover.jpg",
        positionSeconds: 61,
        durationSeconds: 643,
      },
      repeat: "all",
      shuffle: true,
    });
  });

  it("clamps volume instead of rejecting it", () => {
    expect(normalize(null, { system: "on" }, { volume: -5 }).volume).toBe(0);
    expect(normalize(null, { system: "on" }, { volume: 133 }).volume).toBe(100);
  });

  it("treats a non-numeric volume as unknown", () => {
    expect(normalize(null, { system: "on" }, { volume: "loud" }).volume).toBeNull();
  });

  it("falls back to unknown for empty payloads", () => {
    expect(normalize({}, {})).toEqual({
      power: "unknown",
      playback: "unknown",
      source: null,
      volume: null,
      muted: false,
      track: null,
      repeat: "off",
      shuffle: false,
    });
  });

  it("reports stopped playback in standby without a now-playing payload", () => {
    const state = normalize(null, { system: "lona" });
    expect(state.power).toBe("standby");
    expect(state.playback).toBe("stopped");
  });

  it("uses the station name when a radio stream has no title", () => {
    const state = normalize({ transportState: "2", station: "Jazz FM" }, { system: "on" });
    expect(state.track?.title).toBe("Jazz FM");
    expect(state.track?.artist).toBe("");
  });

  it("prefers the levels payload for volume and mute", () => {
    const state = normalize({ volume: 10, mute: "0" }, { system: "on" }, { volume: 30, mute: "1" });
    expect(state.volume).toBe(30);
    expect(state.muted).toBe(true);
  });

  it("falls back to the now-playing volume when levels omit it", () => {
    const state = normalize({ volume: "25", mute: "1" }, { system: "on" }, { balance: 0 });
    expect(state.volume).toBe(25);
    expect(state.muted).toBe(true);
  });
});

describe("normalizePower", () => {
  it("accepts every vendor key", () => {
    expect(normalizePower({ state: "on" })).toBe("on");
    expect(normalizePower({ system: "lona" })).toBe("standby");
    expect(normalizePower({ power: "Standby" })).toBe("standby");
    expect(normalizePower({ power: "rebooting" })).toBe("unknown");
  });
});

describe("normalizePlayback", () => {
  it("prefers transportState over status", () => {
    expect(normalizePlayback({ transportState: "1", status: "playing" })).toBe("paused");
    expect(normalizePlayback({ transportState: 3 })).toBe("buffering");
    expect(normalizePlayback({ status: "Stopped" })).toBe("stopped");
    expect(normalizePlayback({ status: "constructor" })).toBe("unknown");
  });
});

describe("normalizeSource", () => {
  it("passes unknown input ids through", () => {
    expect(normalizeSource({ source: "inputs/phono2" })).toBe("phono2");
    expect(normalizeSource({ source: "inputs/none" })).toBeNull();
    expect(normalizeSource({ input: "DIG2" })).toBe("digital_2");
  });
});

describe("clampVolume", () => {
  it("rounds into range", () => {
    expect(clampVolume(49.6)).toBe(50);
    expect(clampVolume(-0.2)).toBe(0);
  });
});
