export type {
  EntityType,
  EntityAttributes,
  CommandFieldDef,
  EntityRegistration,
  RegistrationResult,
  CommandStatus,
  DeviceSetupOutcome,
  SetupResult,
  DiscoverResult,
  AttributesListener,
  Adapter,
  AdapterFactory,
} from "./types.js";

export { CommandError } from "./types.js";

export type {
  ParentMessage,
  InitMessage,
  ExecuteMessage,
  PingMessage,
  ShutdownMessage,
  SetupMessage,
  DiscoverMessage,
  ChildMessage,
  ReadyMessage,
  ExecuteResultMessage,
  AttributesChangedMessage,
  PongMessage,
  ErrorMessage,
  LogMessage,
  SetupResultMessage,
  DiscoverResultMessage,
} from "./protocol.js";

export { PROTOCOL_VERSION } from "./protocol.js";

export { runAdapter, AdapterSession, isParentMessage } from "./harness.js";
