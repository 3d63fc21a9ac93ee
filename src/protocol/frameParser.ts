/**
 * Pure functions for decoding command and response frames.
 *
 * Every parser is a function of its input slice only: it never keeps state
 * between calls and never consumes a partial frame. A buffer that holds the
 * beginning of a valid frame decodes to `{ done: false }`.
 */

import { createErr, createOk, type Result } from "option-t/plain_result";
import { MalformedFrameError, UnknownOpcodeError } from "../errors.ts";
import {
  OPCODES,
  READ_HEADER_SIZE,
  RESPONSE_DECLARED_HEADER_LENGTH,
  RESPONSE_HEADER_SIZE,
  WRITE_HEADER_SIZE,
} from "./constants.ts";
import type {
  Command,
  Decoded,
  ReadCommand,
  ResponseFrame,
  WriteCommand,
} from "./types.ts";

const INCOMPLETE = { done: false } as const;

function viewOf(buffer: Uint8Array): DataView {
  return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Decode the read command at the start of `buffer` (opcode already checked).
 *
 * Bytes after the 12-byte header are not part of the command.
 */
export function parseReadCommand(buffer: Uint8Array): Decoded<ReadCommand> {
  if (buffer.length < READ_HEADER_SIZE) return INCOMPLETE;
  const view = viewOf(buffer);
  return {
    consumed: READ_HEADER_SIZE,
    done: true,
    value: {
      chipAddress: view.getUint8(5),
      control: view.getUint8(0),
      dataLength: view.getUint32(6),
      kind: "read",
      paramAddress: view.getUint16(10),
      totalLength: view.getUint32(1),
    },
  };
}

/**
 * Decode the write command at the start of `buffer` (opcode already checked).
 *
 * The command is complete only once `14 + data_len` bytes are available; the
 * payload is copied out of the input.
 */
export function parseWriteCommand(buffer: Uint8Array): Decoded<WriteCommand> {
  if (buffer.length < WRITE_HEADER_SIZE) return INCOMPLETE;
  const view = viewOf(buffer);
  const dataLength = view.getUint32(8);
  const frameLength = WRITE_HEADER_SIZE + dataLength;
  if (buffer.length < frameLength) return INCOMPLETE;
  return {
    consumed: frameLength,
    done: true,
    value: {
      channel: view.getUint8(2),
      chipAddress: view.getUint8(7),
      control: view.getUint8(0),
      dataLength,
      kind: "write",
      paramAddress: view.getUint16(12),
      payload: buffer.slice(WRITE_HEADER_SIZE, frameLength),
      safeload: view.getUint8(1),
      totalLength: view.getUint32(3),
    },
  };
}

/**
 * Decode one command from the start of `buffer`.
 *
 * Returns an error only for an opcode other than Read/Write; what to drop in
 * that case is left to the caller.
 */
export function parseCommand(
  buffer: Uint8Array,
): Result<Decoded<Command>, UnknownOpcodeError> {
  if (buffer.length === 0) return createOk(INCOMPLETE);

  const opcode = buffer[0];
  switch (opcode) {
    case OPCODES.READ:
      return createOk(parseReadCommand(buffer));
    case OPCODES.WRITE:
      return createOk(parseWriteCommand(buffer));
    default:
      return createErr(new UnknownOpcodeError(opcode));
  }
}

/**
 * Decode one response frame (opcode 0x0B) from the start of `buffer`.
 *
 * The declared total length delimits the frame: it counts a 13-byte header
 * plus the payload, while the header on the wire is 14 bytes.
 */
export function parseResponse(
  buffer: Uint8Array,
): Result<Decoded<ResponseFrame>, UnknownOpcodeError | MalformedFrameError> {
  if (buffer.length === 0) return createOk(INCOMPLETE);
  if (buffer[0] !== OPCODES.RESPONSE) {
    return createErr(new UnknownOpcodeError(buffer[0]));
  }
  if (buffer.length < RESPONSE_HEADER_SIZE) return createOk(INCOMPLETE);

  const view = viewOf(buffer);
  const totalLength = view.getUint32(1);
  if (totalLength < RESPONSE_DECLARED_HEADER_LENGTH) {
    return createErr(
      new MalformedFrameError(
        `declared length ${totalLength} is shorter than the response header`,
      ),
    );
  }
  const frameLength =
    RESPONSE_HEADER_SIZE + totalLength - RESPONSE_DECLARED_HEADER_LENGTH;
  if (buffer.length < frameLength) return createOk(INCOMPLETE);

  return createOk({
    consumed: frameLength,
    done: true,
    value: {
      chipAddress: view.getUint8(5),
      control: view.getUint8(0),
      dataLength: view.getUint32(6),
      paramAddress: view.getUint16(10),
      payload: buffer.slice(RESPONSE_HEADER_SIZE, frameLength),
      reserved: view.getUint8(13),
      success: view.getUint8(12),
      totalLength,
    },
  });
}

/**
 * Number of padding bytes a read command's declared length accounts for
 * beyond its 12-byte header (2 for the vendor tool, which declares 14).
 */
export function declaredReadPadding(command: ReadCommand): number {
  return Math.max(0, command.totalLength - READ_HEADER_SIZE);
}

/**
 * Count the leading zero bytes of `buffer`, up to `limit`.
 */
export function countZeroPadding(buffer: Uint8Array, limit: number): number {
  const end = Math.min(limit, buffer.length);
  let count = 0;
  while (count < end && buffer[count] === 0) count++;
  return count;
}
