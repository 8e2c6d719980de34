import { CommandError } from "@naim-bridge/adapter-sdk";
import type { z } from "zod";
import type { DeviceClient, DeviceCommand } from "./types.js";
import type { DevicePoller } from "./poller.js";
import { DeviceUnreachableError, MalformedResponseError, RejectedCommandError, describeError } from "./errors.js";

/** Translate a client error into the host-facing command outcome. */
export function toCommandError(err: unknown): CommandError {
  if (err instanceof CommandError) return err;
  if (err instanceof RejectedCommandError) return new CommandError("rejected", err.message);
  if (err instanceof DeviceUnreachableError) return new CommandError("unavailable", err.message);
  if (err instanceof MalformedResponseError) return new CommandError("server_error", err.message);
  return new CommandError("server_error", describeError(err));
}

export function parseParams<T extends z.ZodTypeAny>(
  schema: T,
  params: Record<string, unknown>,
  command: string,
): z.infer<T> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new CommandError("bad_request", `Invalid params for ${command}: ${where}${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

/**
 * Send one command and, once the device accepted it, ask the poller for an
 * out-of-cycle refresh. Failures leave the cached state alone.
 */
export async function sendAndRefresh(
  client: DeviceClient,
  poller: DevicePoller,
  command: DeviceCommand,
): Promise<void> {
  try {
    await client.sendCommand(command);
  } catch (err) {
    throw toCommandError(err);
  }
  void poller.requestPoll();
}
