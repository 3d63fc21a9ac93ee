/**
 * Pure functions for building response and command frames.
 */

import {
  OPCODES,
  READ_COMMAND_DECLARED_LENGTH,
  READ_HEADER_SIZE,
  RESPONSE_DECLARED_HEADER_LENGTH,
  RESPONSE_HEADER_SIZE,
  RESPONSE_STATUS,
  WRITE_HEADER_SIZE,
} from "./constants.ts";
import type {
  Command,
  ReadResponse,
  ResponseHeader,
  WireResponse,
  WriteResponse,
} from "./types.ts";

/** Fields a client supplies for a read command. */
export interface ReadCommandConfig {
  chipAddress: number;
  paramAddress: number;
  dataLength: number;
}

/** Fields a client supplies for a write command. */
export interface WriteCommandConfig {
  chipAddress: number;
  paramAddress: number;
  payload: Uint8Array;
  safeload?: number;
  channel?: number;
}

/**
 * Build a successful read response carrying `payload`.
 *
 * The declared total length covers the header and the payload actually
 * returned, which may differ from the requested `dataLength`.
 */
export function createReadResponse(
  chipAddress: number,
  dataLength: number,
  paramAddress: number,
  payload: Uint8Array,
): ReadResponse {
  return {
    header: {
      chipAddress,
      control: OPCODES.RESPONSE,
      dataLength,
      paramAddress,
      reserved: 0,
      success: RESPONSE_STATUS.OK,
      totalLength: RESPONSE_DECLARED_HEADER_LENGTH + payload.length,
    },
    kind: "read",
    payload,
  };
}

/** Build a successful write acknowledgement. */
export function createWriteResponse(
  chipAddress: number,
  dataLength: number,
  paramAddress: number,
): WriteResponse {
  return {
    header: {
      chipAddress,
      control: OPCODES.RESPONSE,
      dataLength,
      paramAddress,
      reserved: 0,
      success: RESPONSE_STATUS.OK,
      totalLength: RESPONSE_DECLARED_HEADER_LENGTH,
    },
    kind: "write",
  };
}

/**
 * Build a header-only response flagged as failed, echoing the
 * addressing fields of the failed command.
 */
export function createFailureResponse(command: Command): WireResponse {
  const header: ResponseHeader = {
    chipAddress: command.chipAddress,
    control: OPCODES.RESPONSE,
    dataLength: command.dataLength,
    paramAddress: command.paramAddress,
    reserved: 0,
    success: RESPONSE_STATUS.FAILED,
    totalLength: RESPONSE_DECLARED_HEADER_LENGTH,
  };
  return command.kind === "read"
    ? { header, kind: "read", payload: new Uint8Array(0) }
    : { header, kind: "write" };
}

function writeResponseHeader(view: DataView, header: ResponseHeader): void {
  view.setUint8(0, header.control);
  view.setUint32(1, header.totalLength);
  view.setUint8(5, header.chipAddress);
  view.setUint32(6, header.dataLength);
  view.setUint16(10, header.paramAddress);
  view.setUint8(12, header.success);
  view.setUint8(13, header.reserved);
}

/**
 * Serialize a response: the 14-byte header, then for reads the payload
 * verbatim.
 */
export function encodeResponse(response: WireResponse): Uint8Array {
  const payload =
    response.kind === "read" ? response.payload : new Uint8Array(0);
  const bytes = new Uint8Array(RESPONSE_HEADER_SIZE + payload.length);
  writeResponseHeader(new DataView(bytes.buffer), response.header);
  bytes.set(payload, RESPONSE_HEADER_SIZE);
  return bytes;
}

/**
 * Build a read command frame. The declared total length is 14, matching the
 * vendor tool; the frame itself is 12 bytes.
 */
export function encodeReadCommand(config: ReadCommandConfig): Uint8Array {
  const bytes = new Uint8Array(READ_HEADER_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, OPCODES.READ);
  view.setUint32(1, READ_COMMAND_DECLARED_LENGTH);
  view.setUint8(5, config.chipAddress);
  view.setUint32(6, config.dataLength);
  view.setUint16(10, config.paramAddress);
  return bytes;
}

/** Build a write command frame: 14-byte header followed by the payload. */
export function encodeWriteCommand(config: WriteCommandConfig): Uint8Array {
  const { payload } = config;
  const bytes = new Uint8Array(WRITE_HEADER_SIZE + payload.length);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, OPCODES.WRITE);
  view.setUint8(1, config.safeload ?? 0);
  view.setUint8(2, config.channel ?? 0);
  view.setUint32(3, WRITE_HEADER_SIZE + payload.length);
  view.setUint8(7, config.chipAddress);
  view.setUint32(8, payload.length);
  view.setUint16(12, config.paramAddress);
  bytes.set(payload, WRITE_HEADER_SIZE);
  return bytes;
}
