export type NaimErrorCode =
  | "UNREACHABLE"
  | "MALFORMED_RESPONSE"
  | "REJECTED_COMMAND"
  | "CAPACITY_EXCEEDED"
  | "DUPLICATE_DEVICE"
  | "CONFIG_INVALID";

export abstract class NaimError extends Error {
  abstract readonly code: NaimErrorCode;
}

/** Connection refused, DNS failure, timeout or abort. */
export class DeviceUnreachableError extends NaimError {
  readonly code = "UNREACHABLE";

  constructor(readonly url: string, reason: string) {
    super(`Device unreachable (${url}): ${reason}`);
    this.name = "DeviceUnreachableError";
  }
}

export class MalformedResponseError extends NaimError {
  readonly code = "MALFORMED_RESPONSE";

  constructor(readonly url: string, reason: string) {
    super(`Malformed response from ${url}: ${reason}`);
    this.name = "MalformedResponseError";
  }
}

/** The device answered with HTTP 4xx/5xx, or refused the operation up front. */
export class RejectedCommandError extends NaimError {
  readonly code = "REJECTED_COMMAND";

  constructor(readonly status: number | null, message: string) {
    super(message);
    this.name = "RejectedCommandError";
  }
}

export class CapacityExceededError extends NaimError {
  readonly code = "CAPACITY_EXCEEDED";

  constructor(readonly limit: number) {
    super(`Device limit reached (${limit})`);
    this.name = "CapacityExceededError";
  }
}

export class DuplicateDeviceError extends NaimError {
  readonly code = "DUPLICATE_DEVICE";

  constructor(readonly address: string, readonly existingId: string) {
    super(`Device ${address} is already configured as ${existingId}`);
    this.name = "DuplicateDeviceError";
  }
}

export class ConfigInvalidError extends NaimError {
  readonly code = "CONFIG_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "ConfigInvalidError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
