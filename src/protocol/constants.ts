/**
 * Opcodes, frame sizes and defaults of the register protocol.
 *
 * All multi-byte fields on the wire are big-endian.
 */

/** Opcode byte values. */
export const OPCODES = {
  READ: 0x0a,
  WRITE: 0x09,
  RESPONSE: 0x0b,
} as const;

/** Numeric union of the known opcodes. */
export type Opcode = (typeof OPCODES)[keyof typeof OPCODES];

/** Opcodes a peer may send to the bridge. */
export type CommandOpcode = typeof OPCODES.READ | typeof OPCODES.WRITE;

/** control(1) total_len(4) chip_addr(1) data_len(4) param_addr(2) */
export const READ_HEADER_SIZE = 12;
/** control(1) safeload(1) channel(1) total_len(4) chip_addr(1) data_len(4) param_addr(2) */
export const WRITE_HEADER_SIZE = 14;
/** control(1) total_len(4) chip_addr(1) data_len(4) param_addr(2) success(1) reserved(1) */
export const RESPONSE_HEADER_SIZE = 14;

/**
 * Header length a response declares in `total_len`. One less than the bytes
 * actually sent; peers expect `total_len = 13 + payload length`.
 */
export const RESPONSE_DECLARED_HEADER_LENGTH = 13;

/** Total length the vendor tool declares in read commands. */
export const READ_COMMAND_DECLARED_LENGTH = 14;

/** Success flag values carried in response headers. */
export const RESPONSE_STATUS = {
  OK: 0,
  FAILED: 1,
} as const;

export const DEFAULT_TCP_PORT = 8086;
export const DEFAULT_HTTP_PORT = 8080;

/** One full DSP memory partition (20480 words of 4 bytes) plus a write header. */
export const DEFAULT_BUFFER_CAPACITY = 20480 * 4 + WRITE_HEADER_SIZE;

/** Largest 16-bit parameter address. */
export const MAX_PARAM_ADDRESS = 0xffff;

/**
 * Return true when the byte is an opcode a client may send.
 *
 * @param byte - First byte of a frame
 */
export function isCommandOpcode(byte: number): byte is CommandOpcode {
  return byte === OPCODES.READ || byte === OPCODES.WRITE;
}
