import type { Backend } from "../backend/backend.ts";
import { BackendError, toError } from "../errors.ts";
import {
  createReadResponse,
  createWriteResponse,
} from "../protocol/frameBuilder.ts";
import type { Command, Response } from "../protocol/types.ts";

/**
 * Execute one decoded command against the backend.
 *
 * Never rejects: a backend failure becomes an {@link ErrorResponse} carrying
 * the command, so the caller decides whether anything goes on the wire.
 * Reads longer than `maxReadLength` fail without reaching the backend.
 */
export async function dispatchCommand(
  backend: Backend,
  command: Command,
  maxReadLength = Number.POSITIVE_INFINITY,
): Promise<Response> {
  try {
    switch (command.kind) {
      case "read": {
        if (command.dataLength > maxReadLength) {
          throw new BackendError(
            `Read length ${command.dataLength} exceeds limit ${maxReadLength}`,
          );
        }
        const data = await backend.read(
          command.paramAddress,
          command.dataLength,
        );
        return createReadResponse(
          command.chipAddress,
          command.dataLength,
          command.paramAddress,
          data,
        );
      }
      case "write":
        await backend.write(command.paramAddress, command.payload);
        return createWriteResponse(
          command.chipAddress,
          command.dataLength,
          command.paramAddress,
        );
    }
  } catch (error) {
    const verb = command.kind === "read" ? "read from" : "write to";
    return {
      command,
      kind: "error",
      message: `Failed to ${verb} backend: ${toError(error).message}`,
    };
  }
}
