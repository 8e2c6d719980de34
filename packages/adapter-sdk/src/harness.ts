import { createInterface } from "node:readline";
import type { AdapterFactory, Adapter } from "./types.js";
import { CommandError } from "./types.js";
import type { ParentMessage, ChildMessage } from "./protocol.js";
import { PROTOCOL_VERSION } from "./protocol.js";

type LogLevel = "debug" | "info" | "warn" | "error";

const PARENT_MESSAGE_TYPES: ReadonlySet<string> = new Set<ParentMessage["type"]>([
  "init",
  "execute",
  "ping",
  "shutdown",
  "setup",
  "discover",
]);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isParentMessage(value: unknown): value is ParentMessage {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  const type = value.type;
  return typeof type === "string" && PARENT_MESSAGE_TYPES.has(type);
}

/**
 * Dispatches host messages to one adapter instance. Transport-agnostic:
 * `runAdapter` wires it to stdio, tests drive it directly.
 */
export class AdapterSession {
  private adapter: Adapter | null = null;

  constructor(
    private factory: AdapterFactory,
    private send: (msg: ChildMessage) => void,
    private exit: (code: number) => void,
  ) {}

  get initialized(): boolean {
    return this.adapter !== null;
  }

  log(level: LogLevel, args: unknown[]): void {
    const message = args.map((a) => (typeof a === "string" ? a : a instanceof Error ? a.message : JSON.stringify(a))).join(" ");
    this.send({ type: "log", level, message });
  }

  async handle(msg: ParentMessage): Promise<void> {
    switch (msg.type) {
      case "init": {
        if (msg.protocolVersion !== PROTOCOL_VERSION) {
          this.send({
            type: "error",
            message: `Protocol version mismatch: expected ${PROTOCOL_VERSION}, got ${msg.protocolVersion}`,
          });
          this.exit(1);
          return;
        }
        try {
          const adapter = this.factory(msg.config);
          this.adapter = adapter;
          const { entities } = await adapter.register();

          await adapter.subscribe((entityId, attributes) => {
            this.send({ type: "attributes_changed", entityId, attributes });
          });

          this.send({ type: "ready", entities });
        } catch (err) {
          this.send({ type: "error", message: `Init failed: ${errorMessage(err)}` });
          this.exit(1);
        }
        break;
      }

      case "execute": {
        if (!this.adapter) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          await this.adapter.execute(msg.entityId, msg.command, msg.params ?? {});
          this.send({ type: "execute_result", requestId: msg.requestId, success: true, status: "ok" });
        } catch (err) {
          this.send({
            type: "execute_result",
            requestId: msg.requestId,
            success: false,
            status: err instanceof CommandError ? err.status : "server_error",
            error: errorMessage(err),
          });
        }
        break;
      }

      case "ping": {
        if (!this.adapter) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          const healthy = await this.adapter.ping();
          this.send({ type: "pong", requestId: msg.requestId, healthy });
        } catch (err) {
          this.send({ type: "error", requestId: msg.requestId, message: errorMessage(err) });
        }
        break;
      }

      case "setup": {
        if (!this.adapter) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        if (!this.adapter.setup) {
          this.send({
            type: "setup_result",
            requestId: msg.requestId,
            success: false,
            devices: [],
            message: "This adapter does not support setup",
          });
          return;
        }
        try {
          const result = await this.adapter.setup(msg.params);
          this.send({
            type: "setup_result",
            requestId: msg.requestId,
            success: result.success,
            devices: result.devices,
            entities: result.entities,
            message: result.message,
          });
        } catch (err) {
          this.send({
            type: "setup_result",
            requestId: msg.requestId,
            success: false,
            devices: [],
            message: errorMessage(err),
          });
        }
        break;
      }

      case "discover": {
        if (!this.adapter) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        if (!this.adapter.discover) {
          this.send({
            type: "discover_result",
            requestId: msg.requestId,
            devices: [],
            message: "This adapter does not support discovery",
          });
          return;
        }
        try {
          const result = await this.adapter.discover(msg.params);
          this.send({
            type: "discover_result",
            requestId: msg.requestId,
            devices: result.devices,
            message: result.message,
          });
        } catch (err) {
          this.send({ type: "error", requestId: msg.requestId, message: errorMessage(err) });
        }
        break;
      }

      case "shutdown": {
        if (this.adapter) {
          await this.adapter.destroy();
          this.adapter = null;
        }
        this.exit(0);
      }
    }
  }
}

function writeMessage(msg: ChildMessage): void {
  process.stdout.write(JSON.stringify(msg) + "\n");
}

/** Intercept console.* so adapter authors can use them normally. */
function interceptConsole(session: AdapterSession): void {
  console.log = (...args: unknown[]) => session.log("info", args);
  console.info = (...args: unknown[]) => session.log("info", args);
  console.warn = (...args: unknown[]) => session.log("warn", args);
  console.error = (...args: unknown[]) => session.log("error", args);
  console.debug = (...args: unknown[]) => session.log("debug", args);
}

/**
 * Entry point for adapter processes. Call this with your adapter factory
 * at the top level of your entry file:
 *
 * ```ts
 * import { runAdapter } from "@naim-bridge/adapter-sdk";
 * runAdapter((config) => new MyAdapter(config));
 * ```
 */
export function runAdapter(factory: AdapterFactory): void {
  const session = new AdapterSession(factory, writeMessage, (code) => process.exit(code));
  interceptConsole(session);

  const rl = createInterface({ input: process.stdin });

  rl.on("line", (line) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      process.stderr.write(`[adapter-sdk] Failed to parse message: ${line}\n`);
      return;
    }
    if (!isParentMessage(parsed)) {
      process.stderr.write(`[adapter-sdk] Unknown message: ${line}\n`);
      return;
    }

    session.handle(parsed).catch((err) => {
      writeMessage({ type: "error", message: `Unhandled error: ${errorMessage(err)}` });
    });
  });

  rl.on("close", () => {
    // stdin closed: parent is gone
    process.exit(0);
  });
}
