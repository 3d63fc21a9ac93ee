/**
 * Error types shared by the codec, the connection loop and the backends.
 */

import type { UnknownCommand } from "./protocol/types.ts";

/** Base error class for bridge-related errors. */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BridgeError";
  }
}

/** First byte of a frame is not an opcode this side accepts. */
export class UnknownOpcodeError extends BridgeError {
  constructor(public readonly opcode: number) {
    super(
      `Unknown command: 0x${opcode.toString(16).padStart(2, "0")}`,
      "UNKNOWN_OPCODE",
    );
    this.name = "UnknownOpcodeError";
  }

  /** The rejected frame start as a command value. */
  get command(): UnknownCommand {
    return { kind: "unknown", opcode: this.opcode };
  }
}

/** Error for a frame whose header fields contradict each other. */
export class MalformedFrameError extends BridgeError {
  constructor(message: string) {
    super(`Frame error: ${message}`, "MALFORMED_FRAME");
    this.name = "MalformedFrameError";
  }
}

/** A register access failed (bus I/O, remote bridge, bad arguments). */
export class BackendError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "BACKEND_FAILURE", options);
    this.name = "BackendError";
  }
}

/** A single command does not fit the connection buffer. */
export class BufferOverflowError extends BridgeError {
  constructor(public readonly capacity: number) {
    super(
      `Command exceeds connection buffer capacity (${capacity} bytes)`,
      "BUFFER_OVERFLOW",
    );
    this.name = "BufferOverflowError";
  }
}

/** Socket level failure on read or write. */
export class ConnectionIOError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONNECTION_IO", options);
    this.name = "ConnectionIOError";
  }
}

/** Error for concurrent request attempts on a sequential client. */
export class BusyError extends BridgeError {
  constructor() {
    super("Another request is in progress", "BUSY");
    this.name = "BusyError";
  }
}

/** Invalid environment or option values. */
export class ConfigError extends BridgeError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message, "CONFIG");
    this.name = "ConfigError";
  }
}

/** Register value cannot be converted to or from its number format. */
export class RegisterFormatError extends BridgeError {
  constructor(message: string) {
    super(message, "REGISTER_FORMAT");
    this.name = "RegisterFormatError";
  }
}

/** Write attempted on a register the map marks read-only. */
export class ReadOnlyRegisterError extends BridgeError {
  constructor(public readonly registerName: string) {
    super(`Register "${registerName}" is read-only`, "READ_ONLY_REGISTER");
    this.name = "ReadOnlyRegisterError";
  }
}

/** Normalize an unknown thrown value to an Error instance. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
