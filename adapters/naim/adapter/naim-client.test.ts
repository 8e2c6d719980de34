import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { NaimClient } from "./naim-client.js";
import { DeviceUnreachableError, MalformedResponseError, RejectedCommandError } from "./errors.js";

const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function lastCall(): { url: string; method: string | undefined } {
  const call = fetchMock.mock.calls.at(-1);
  if (!call) throw new Error("fetch was not called");
  return { url: call[0], method: call[1]?.method };
}

describe("NaimClient", () => {
  let client: NaimClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new NaimClient("192.168.1.20", 15081, 50);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads /nowplaying", async () => {
    fetchMock.mockResolvedValue(json({ transportState: "2", title: "So What" }));

    await expect(client.fetchNowPlaying()).resolves.toEqual({ transportState: "2", title: "So What" });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/nowplaying", method: "GET" });
  });

  it("maps commands onto the device API", async () => {
    fetchMock.mockImplementation(async () => new Response(null, { status: 200 }));

    await client.sendCommand({ kind: "set_volume", volume: 55 });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/levels/room?volume=55", method: "PUT" });

    await client.sendCommand({ kind: "previous" });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/nowplaying?cmd=prev", method: "GET" });

    await client.sendCommand({ kind: "set_source", source: "analog_1" });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/inputs/ana1?cmd=select", method: "GET" });

    await client.sendCommand({ kind: "set_power", on: false });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/power?system=lona", method: "PUT" });

    await client.sendCommand({ kind: "set_mute", muted: true });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/levels/room?mute=1", method: "PUT" });

    await client.sendCommand({ kind: "set_repeat", repeat: "one" });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/nowplaying?repeat=1", method: "PUT" });

    await client.sendCommand({ kind: "set_shuffle", shuffle: false });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/nowplaying?shuffle=0", method: "PUT" });
  });

  it("accepts an empty command response", async () => {
    fetchMock.mockResolvedValue(new Response("", { status: 200 }));
    await expect(client.sendCommand({ kind: "play" })).resolves.toEqual({});
  });

  it("rejects an out-of-range volume without a request", async () => {
    await expect(client.sendCommand({ kind: "set_volume", volume: 101 })).rejects.toBeInstanceOf(RejectedCommandError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports HTTP errors as rejections carrying the status", async () => {
    fetchMock.mockResolvedValue(new Response("busy", { status: 500 }));

    const err = await client.sendCommand({ kind: "next" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RejectedCommandError);
    expect(err).toMatchObject({ status: 500, code: "REJECTED_COMMAND" });
  });

  it("reports connection failures as unreachable", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    const err = await client.fetchPower().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeviceUnreachableError);
    expect(err).toMatchObject({ message: "Device unreachable (http://192.168.1.20:15081/power): fetch failed" });
  });

  it("times out a hanging request", async () => {
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    const err = await client.fetchNowPlaying().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeviceUnreachableError);
    expect(err).toMatchObject({
      message: "Device unreachable (http://192.168.1.20:15081/nowplaying): timed out after 50ms",
    });
  });

  it("flags non-JSON bodies as malformed", async () => {
    fetchMock.mockResolvedValue(new Response("<html></html>", { status: 200 }));
    await expect(client.fetchNowPlaying()).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("requires a power field in /power", async () => {
    fetchMock.mockResolvedValue(json({ serverVersion: "1.0" }));
    await expect(client.fetchPower()).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("returns input children", async () => {
    fetchMock.mockResolvedValue(json({ children: [{ name: "USB", ussi: "inputs/usb" }, "junk"] }));
    await expect(client.fetchInputs()).resolves.toEqual([{ name: "USB", ussi: "inputs/usb" }]);
  });

  it("brackets IPv6 hosts", () => {
    expect(new NaimClient("fe80::1").baseUrl).toBe("http://[fe80::1]:15081");
  });

  it("sends every request under the API path", async () => {
    fetchMock.mockImplementation(async () => json({ system: "on" }));
    const prefixed = new NaimClient("192.168.1.20", 15081, 50, "/naim");

    await prefixed.fetchPower();
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/naim/power", method: "GET" });

    await prefixed.sendCommand({ kind: "set_mute", muted: false });
    expect(lastCall()).toEqual({ url: "http://192.168.1.20:15081/naim/levels/room?mute=0", method: "PUT" });
  });
});

describe("NaimClient.detectApiPath", () => {
  const client = new NaimClient("192.168.1.20", 15081, 50);

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("uses /naim when the root page links there and the API answers", async () => {
    fetchMock.mockImplementation(async (url) => {
      if (url === "http://192.168.1.20:15081/") {
        return new Response('<a href="naim/index.fcgi">Naim</a>', { status: 200 });
      }
      if (url === "http://192.168.1.20:15081/naim/nowplaying") return new Response("", { status: 503 });
      if (url === "http://192.168.1.20:15081/naim/system") return json({ model: "NDX 2" });
      return new Response("", { status: 404 });
    });

    await expect(client.detectApiPath()).resolves.toBe("/naim");
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "http://192.168.1.20:15081/",
      "http://192.168.1.20:15081/naim/nowplaying",
      "http://192.168.1.20:15081/naim/system",
    ]);
  });

  it("keeps the root API when the root page does not mention /naim", async () => {
    fetchMock.mockImplementation(async () => new Response("<html>Uniti</html>", { status: 200 }));

    await expect(client.detectApiPath()).resolves.toBe("");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("falls back to the root API when /naim does not answer", async () => {
    fetchMock.mockImplementation(async (url) =>
      url === "http://192.168.1.20:15081/"
        ? new Response("see naim/", { status: 200 })
        : new Response("", { status: 404 }),
    );

    await expect(client.detectApiPath()).resolves.toBe("");
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("treats an error page at the root as no prefix", async () => {
    fetchMock.mockImplementation(async () => new Response("", { status: 404 }));
    await expect(client.detectApiPath()).resolves.toBe("");
  });

  it("reports an unreachable device", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    await expect(client.detectApiPath()).rejects.toBeInstanceOf(DeviceUnreachableError);
  });
});
