// ── Entity Types ────────────────────────────────────────────────────────────

export type EntityType = "media_player" | "remote";

export type EntityAttributes = Record<string, unknown>;

// ── Command Field Definition ──────────────────────────────────────────────

export interface CommandFieldDef {
  type: "boolean" | "number" | "string" | "object";
  description?: string;
  values?: (number | string)[];
  min?: number;
  max?: number;
}

// ── Entity Registration ────────────────────────────────────────────────────

export interface EntityRegistration {
  entityId: string;
  entityType: EntityType;
  displayName?: string;
  /** Id of the physical device this entity belongs to. */
  deviceId?: string;
  features: string[];
  commands: Record<string, Record<string, CommandFieldDef>>;
  /** Remote entities list their button commands here. */
  simpleCommands?: string[];
  attributes: EntityAttributes;
}

export interface RegistrationResult {
  entities: EntityRegistration[];
}

// ── Command Outcome ───────────────────────────────────────────────────────

export type CommandStatus =
  | "ok"
  | "bad_request"
  | "not_found"
  | "not_implemented"
  | "rejected"
  | "unavailable"
  | "server_error";

/**
 * Thrown from `Adapter.execute` to answer a command with a specific status.
 * Any other error is reported as `server_error`.
 */
export class CommandError extends Error {
  readonly status: Exclude<CommandStatus, "ok">;

  constructor(status: Exclude<CommandStatus, "ok">, message: string) {
    super(message);
    this.name = "CommandError";
    this.status = status;
  }
}

// ── Setup / Discover Results ────────────────────────────────────────────

export interface DeviceSetupOutcome {
  input: string;
  success: boolean;
  deviceId?: string;
  name?: string;
  error?: string;
  code?: string;
}

export interface SetupResult {
  success: boolean;
  devices: DeviceSetupOutcome[];
  /** Full entity list after the change; omitted when nothing changed. */
  entities?: EntityRegistration[];
  message?: string;
}

export interface DiscoverResult {
  devices: Array<{ id: string; name: string; address: string; metadata?: Record<string, unknown> }>;
  message?: string;
}

// ── Adapter Interface ──────────────────────────────────────────────────────

export type AttributesListener = (entityId: string, attributes: EntityAttributes) => void;

export interface Adapter {
  register(): Promise<RegistrationResult>;
  execute(
    entityId: string,
    command: string,
    params: Record<string, unknown>,
  ): Promise<void>;
  subscribe(cb: AttributesListener): Promise<void>;
  ping(): Promise<boolean>;
  destroy(): Promise<void>;
  setup?(params: Record<string, unknown>): Promise<SetupResult>;
  discover?(params: Record<string, unknown>): Promise<DiscoverResult>;
}

export type AdapterFactory = (config: Record<string, unknown>) => Adapter;
