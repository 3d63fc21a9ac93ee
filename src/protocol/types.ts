/**
 * Value types exchanged with the codec. Every value is built per parse or
 * encode call and never mutated afterwards.
 */

/** Read command (opcode 0x0A), always 12 bytes on the wire. */
export interface ReadCommand {
  readonly kind: "read";
  /** Opcode byte as received. */
  readonly control: number;
  /** Declared frame length; informational only. */
  readonly totalLength: number;
  /** Device-select byte embedded in the command. */
  readonly chipAddress: number;
  /** Number of bytes to read. */
  readonly dataLength: number;
  /** 16-bit register address. */
  readonly paramAddress: number;
}

/** Write command (opcode 0x09): 14-byte header followed by the payload. */
export interface WriteCommand {
  readonly kind: "write";
  readonly control: number;
  /** Safeload flag, preserved verbatim. */
  readonly safeload: number;
  /** Channel number, preserved verbatim. */
  readonly channel: number;
  readonly totalLength: number;
  readonly chipAddress: number;
  /** Payload size; equals `payload.length` on every decoded command. */
  readonly dataLength: number;
  readonly paramAddress: number;
  readonly payload: Uint8Array;
}

/** Discriminated union of the commands the bridge executes. */
export type Command = ReadCommand | WriteCommand;

/** Opcode that matched neither Read nor Write. */
export interface UnknownCommand {
  readonly kind: "unknown";
  readonly opcode: number;
}

/** Header shared by read and write responses (14 bytes on the wire). */
export interface ResponseHeader {
  readonly control: number;
  readonly totalLength: number;
  readonly chipAddress: number;
  readonly dataLength: number;
  readonly paramAddress: number;
  /** 0 on success. */
  readonly success: number;
  readonly reserved: number;
}

export interface ReadResponse {
  readonly kind: "read";
  readonly header: ResponseHeader;
  readonly payload: Uint8Array;
}

export interface WriteResponse {
  readonly kind: "write";
  readonly header: ResponseHeader;
}

/** Diagnostic outcome; has no wire form. */
export interface ErrorResponse {
  readonly kind: "error";
  readonly message: string;
  /** The command that produced the failure, when one was decoded. */
  readonly command?: Command;
}

/** Responses that can be serialized onto the wire. */
export type WireResponse = ReadResponse | WriteResponse;

export type Response = WireResponse | ErrorResponse;

/** A response frame decoded from the wire (client side). */
export interface ResponseFrame extends ResponseHeader {
  readonly payload: Uint8Array;
}

/**
 * Progress of a decode attempt over a byte buffer.
 *
 * `done: false` means the buffer holds a prefix of a valid frame and the
 * caller must wait for more bytes; nothing was consumed.
 */
export type Decoded<T> =
  | { readonly done: true; readonly value: T; readonly consumed: number }
  | { readonly done: false };
