import { describe, it, expect, vi } from "vitest";
import { AdapterSession, isParentMessage } from "./harness.js";
import { CommandError } from "./types.js";
import type { Adapter, AttributesListener } from "./types.js";
import type { ChildMessage } from "./protocol.js";
import { PROTOCOL_VERSION } from "./protocol.js";

class StubAdapter implements Adapter {
  listener: AttributesListener | null = null;
  destroyed = false;

  async register() {
    return {
      entities: [
        { entityId: "amp", entityType: "media_player" as const, features: [], commands: {}, attributes: { state: "ON" } },
      ],
    };
  }

  async execute(entityId: string, command: string): Promise<void> {
    if (command === "explode") throw new Error("boom");
    if (command !== "play") throw new CommandError("not_implemented", `${entityId} cannot ${command}`);
  }

  async subscribe(cb: AttributesListener): Promise<void> {
    this.listener = cb;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
  }
}

function session() {
  const sent: ChildMessage[] = [];
  const exit = vi.fn<(code: number) => void>();
  const adapter = new StubAdapter();
  const s = new AdapterSession(() => adapter, (msg) => sent.push(msg), exit);
  return { s, sent, exit, adapter };
}

const init = {
  type: "init" as const,
  protocolVersion: PROTOCOL_VERSION,
  adapterId: "naim-1",
  adapterType: "naim",
  config: {},
};

describe("AdapterSession", () => {
  it("registers, subscribes and reports ready", async () => {
    const { s, sent, adapter } = session();
    await s.handle(init);

    expect(sent).toEqual([
      {
        type: "ready",
        entities: [{ entityId: "amp", entityType: "media_player", features: [], commands: {}, attributes: { state: "ON" } }],
      },
    ]);

    adapter.listener?.("amp", { state: "PLAYING" });
    expect(sent[1]).toEqual({ type: "attributes_changed", entityId: "amp", attributes: { state: "PLAYING" } });
  });

  it("exits on a protocol mismatch", async () => {
    const { s, sent, exit } = session();
    await s.handle({ ...init, protocolVersion: 99 });

    expect(sent).toEqual([{ type: "error", message: "Protocol version mismatch: expected 1, got 99" }]);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("answers commands with an outcome status", async () => {
    const { s, sent } = session();
    await s.handle(init);
    sent.length = 0;

    await s.handle({ type: "execute", requestId: "r1", entityId: "amp", command: "play" });
    await s.handle({ type: "execute", requestId: "r2", entityId: "amp", command: "dance" });
    await s.handle({ type: "execute", requestId: "r3", entityId: "amp", command: "explode" });

    expect(sent).toEqual([
      { type: "execute_result", requestId: "r1", success: true, status: "ok" },
      { type: "execute_result", requestId: "r2", success: false, status: "not_implemented", error: "amp cannot dance" },
      { type: "execute_result", requestId: "r3", success: false, status: "server_error", error: "boom" },
    ]);
  });

  it("refuses requests before init", async () => {
    const { s, sent } = session();
    await s.handle({ type: "ping", requestId: "p1" });
    expect(sent).toEqual([{ type: "error", requestId: "p1", message: "Not initialized" }]);
  });

  it("reports missing setup support", async () => {
    const { s, sent } = session();
    await s.handle(init);
    sent.length = 0;

    await s.handle({ type: "setup", requestId: "s1", params: {} });
    expect(sent).toEqual([
      { type: "setup_result", requestId: "s1", success: false, devices: [], message: "This adapter does not support setup" },
    ]);
  });

  it("destroys the adapter on shutdown", async () => {
    const { s, exit, adapter } = session();
    await s.handle(init);
    await s.handle({ type: "shutdown" });

    expect(adapter.destroyed).toBe(true);
    expect(exit).toHaveBeenCalledWith(0);
    expect(s.initialized).toBe(false);
  });

  it("forwards console output as log messages", () => {
    const { s, sent } = session();
    s.log("warn", ["[Poller x] Poll failed:", "timeout", { attempt: 2 }]);
    expect(sent).toEqual([{ type: "log", level: "warn", message: '[Poller x] Poll failed: timeout {"attempt":2}' }]);
  });
});

describe("isParentMessage", () => {
  it("accepts known message types only", () => {
    expect(isParentMessage({ type: "ping", requestId: "1" })).toBe(true);
    expect(isParentMessage({ type: "observe" })).toBe(false);
    expect(isParentMessage(null)).toBe(false);
  });
});
