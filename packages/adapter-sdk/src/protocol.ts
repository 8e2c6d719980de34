import type {
  CommandStatus,
  DeviceSetupOutcome,
  DiscoverResult,
  EntityAttributes,
  EntityRegistration,
} from "./types.js";

export const PROTOCOL_VERSION = 1;

// ── Parent → Child Messages ─────────────────────────────────────────────────

export interface InitMessage {
  type: "init";
  protocolVersion: number;
  adapterId: string;
  adapterType: string;
  config: Record<string, unknown>;
}

export interface ExecuteMessage {
  type: "execute";
  requestId: string;
  entityId: string;
  command: string;
  params?: Record<string, unknown>;
}

export interface PingMessage {
  type: "ping";
  requestId: string;
}

export interface ShutdownMessage {
  type: "shutdown";
}

export interface SetupMessage {
  type: "setup";
  requestId: string;
  params: Record<string, unknown>;
}

export interface DiscoverMessage {
  type: "discover";
  requestId: string;
  params: Record<string, unknown>;
}

export type ParentMessage =
  | InitMessage
  | ExecuteMessage
  | PingMessage
  | ShutdownMessage
  | SetupMessage
  | DiscoverMessage;

// ── Child → Parent Messages ─────────────────────────────────────────────────

export interface ReadyMessage {
  type: "ready";
  entities: EntityRegistration[];
}

export interface ExecuteResultMessage {
  type: "execute_result";
  requestId: string;
  success: boolean;
  status: CommandStatus;
  error?: string;
}

export interface AttributesChangedMessage {
  type: "attributes_changed";
  entityId: string;
  attributes: EntityAttributes;
}

export interface PongMessage {
  type: "pong";
  requestId: string;
  healthy: boolean;
}

export interface ErrorMessage {
  type: "error";
  requestId?: string;
  message: string;
}

export interface LogMessage {
  type: "log";
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export interface SetupResultMessage {
  type: "setup_result";
  requestId: string;
  success: boolean;
  devices: DeviceSetupOutcome[];
  entities?: EntityRegistration[];
  message?: string;
}

export interface DiscoverResultMessage {
  type: "discover_result";
  requestId: string;
  devices: DiscoverResult["devices"];
  message?: string;
}

export type ChildMessage =
  | ReadyMessage
  | ExecuteResultMessage
  | AttributesChangedMessage
  | PongMessage
  | ErrorMessage
  | LogMessage
  | SetupResultMessage
  | DiscoverResultMessage;
