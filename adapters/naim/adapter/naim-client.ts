import type { DeviceClient, DeviceCommand, RawInput, RawPayload } from "./types.js";
import { DEFAULT_PORT } from "./types.js";
import { DeviceUnreachableError, MalformedResponseError, RejectedCommandError, describeError } from "./errors.js";
import { vendorIdFor } from "./sources.js";

export const DEFAULT_REQUEST_TIMEOUT = 3_000;

const REPEAT_VALUES = { off: "0", one: "1", all: "2" } as const;

/** Path prefix some firmware serves the API under. */
export const NAIM_API_PATH = "/naim";
const API_PATH_CHECKS = ["/nowplaying", "/system", "/inputs"];

type Method = "GET" | "PUT";

interface RequestSpec {
  method: Method;
  path: string;
  query?: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP client for one Naim device. Every call is a single round trip with a
 * bounded timeout; retry policy belongs to the caller.
 */
export class NaimClient implements DeviceClient {
  readonly baseUrl: string;
  /** `baseUrl` plus the API path prefix, if any. */
  readonly apiBase: string;
  private timeoutMs: number;

  constructor(
    readonly host: string,
    readonly port: number = DEFAULT_PORT,
    timeoutMs: number = DEFAULT_REQUEST_TIMEOUT,
    apiPath = "",
  ) {
    this.baseUrl = `http://${host.includes(":") ? `[${host}]` : host}:${port}`;
    this.apiBase = `${this.baseUrl}${apiPath}`;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Returns `/naim` when the device's root page links into it and the API
   * answers there, otherwise "". A root page that errors means no prefix.
   */
  async detectApiPath(signal?: AbortSignal): Promise<string> {
    let root: string;
    try {
      root = await this.send("GET", `${this.baseUrl}/`, signal);
    } catch (err) {
      if (err instanceof RejectedCommandError) return "";
      throw err;
    }
    if (!root.includes("naim/")) return "";

    for (const path of API_PATH_CHECKS) {
      const url = `${this.baseUrl}${NAIM_API_PATH}${path}`;
      try {
        if (isRecord(parseJson(url, await this.send("GET", url, signal)))) {
          console.info(`[NaimClient] ${this.baseUrl} serves its API under ${NAIM_API_PATH}`);
          return NAIM_API_PATH;
        }
      } catch (err) {
        console.debug(`[NaimClient] ${url} failed:`, describeError(err));
      }
    }
    console.warn(`[NaimClient] ${this.baseUrl} links to ${NAIM_API_PATH} but nothing answers there; using the root API`);
    return "";
  }

  async fetchNowPlaying(signal?: AbortSignal): Promise<RawPayload> {
    return this.getObject("/nowplaying", signal);
  }

  async fetchPower(signal?: AbortSignal): Promise<RawPayload> {
    const data = await this.getObject("/power", signal);
    if (data.state === undefined && data.system === undefined && data.power === undefined) {
      throw new MalformedResponseError(this.url("/power"), "no power state field");
    }
    return data;
  }

  async fetchLevels(signal?: AbortSignal): Promise<RawPayload> {
    return this.getObject("/levels/room", signal);
  }

  async fetchInputs(signal?: AbortSignal): Promise<RawInput[]> {
    const data = await this.getObject("/inputs", signal);
    if (!Array.isArray(data.children)) {
      throw new MalformedResponseError(this.url("/inputs"), "missing children list");
    }
    return data.children.filter(isRecord);
  }

  async fetchSystemInfo(signal?: AbortSignal): Promise<RawPayload> {
    return this.getObject("/system", signal);
  }

  async sendCommand(command: DeviceCommand, signal?: AbortSignal): Promise<RawPayload> {
    const spec = this.commandRequest(command);
    const body = await this.request(spec, signal);
    // Commands answer with anything from an empty body to a full object.
    return isRecord(body) ? body : {};
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private commandRequest(command: DeviceCommand): RequestSpec {
    switch (command.kind) {
      case "play":
      case "pause":
      case "stop":
      case "next":
        return { method: "GET", path: "/nowplaying", query: { cmd: command.kind } };
      case "previous":
        return { method: "GET", path: "/nowplaying", query: { cmd: "prev" } };
      case "set_volume": {
        const { volume } = command;
        if (!Number.isInteger(volume) || volume < 0 || volume > 100) {
          throw new RejectedCommandError(null, `Volume must be an integer 0-100, got ${volume}`);
        }
        return { method: "PUT", path: "/levels/room", query: { volume: String(volume) } };
      }
      case "set_mute":
        return { method: "PUT", path: "/levels/room", query: { mute: command.muted ? "1" : "0" } };
      case "set_source":
        return {
          method: "GET",
          path: `/inputs/${encodeURIComponent(vendorIdFor(command.source))}`,
          query: { cmd: "select" },
        };
      case "set_power":
        return { method: "PUT", path: "/power", query: { system: command.on ? "on" : "lona" } };
      case "set_repeat":
        return { method: "PUT", path: "/nowplaying", query: { repeat: REPEAT_VALUES[command.repeat] } };
      case "set_shuffle":
        return { method: "PUT", path: "/nowplaying", query: { shuffle: command.shuffle ? "1" : "0" } };
    }
  }

  private url(path: string, query?: Record<string, string>): string {
    const qs = query ? `?${new URLSearchParams(query).toString()}` : "";
    return `${this.apiBase}${path}${qs}`;
  }

  private async getObject(path: string, signal?: AbortSignal): Promise<RawPayload> {
    const body = await this.request({ method: "GET", path }, signal);
    if (!isRecord(body)) {
      throw new MalformedResponseError(this.url(path), "expected a JSON object");
    }
    return body;
  }

  /** Returns the parsed JSON body, or null for an empty 2xx body. */
  private async request(spec: RequestSpec, signal?: AbortSignal): Promise<unknown> {
    const url = this.url(spec.path, spec.query);
    const text = await this.send(spec.method, url, signal);
    return text.trim() ? parseJson(url, text) : null;
  }

  /** One round trip; resolves with the body of a 2xx response. */
  private async send(method: Method, url: string, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let res: Response;
    let text: string;
    try {
      res = await fetch(url, {
        method,
        headers: { Accept: "application/json" },
        signal: combined,
      });
      text = await res.text();
    } catch (err) {
      const reason = timeout.aborted ? `timed out after ${this.timeoutMs}ms` : describeError(err);
      throw new DeviceUnreachableError(url, reason);
    }

    if (!res.ok) {
      const path = url.slice(this.baseUrl.length).split("?")[0];
      throw new RejectedCommandError(
        res.status,
        `Device rejected ${method} ${path}: HTTP ${res.status}${text ? ` ${text.slice(0, 200)}` : ""}`,
      );
    }
    return text;
  }
}

function parseJson(url: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new MalformedResponseError(url, "body is not JSON");
  }
}
