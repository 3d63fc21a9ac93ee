// Number and byte formatting helpers shared by the HTTP surface, the
// HTTP-bridge backend and debug logging. All functions are pure.

const HEX_DIGITS = /^[0-9A-Fa-f]+$/;
const DEC_DIGITS = /^[0-9]+$/;

/**
 * Parse an unsigned integer written either as a `0x`/`0X`-prefixed hex
 * literal or as a plain decimal literal.
 *
 * Returns undefined for anything else, including values above `max`.
 */
export function parseNumber(value: string, max = 0xffff): number | undefined {
  let num: number;
  if (value.startsWith("0x") || value.startsWith("0X")) {
    const digits = value.slice(2);
    if (!HEX_DIGITS.test(digits)) return undefined;
    num = Number.parseInt(digits, 16);
  } else {
    if (!DEC_DIGITS.test(value)) return undefined;
    num = Number.parseInt(value, 10);
  }
  return num <= max ? num : undefined;
}

/**
 * Decode a contiguous hex-digit string into bytes.
 *
 * An optional `0x` prefix is skipped, pairs that are not two hex digits are
 * dropped, and an odd trailing digit is ignored.
 */
export function parseHexData(hex: string): Uint8Array {
  const clean = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  const bytes: number[] = [];
  for (let i = 0; i + 1 < clean.length; i += 2) {
    const pair = clean.slice(i, i + 2);
    if (HEX_DIGITS.test(pair)) {
      bytes.push(Number.parseInt(pair, 16));
    }
  }
  return Uint8Array.from(bytes);
}

/** Encode bytes as contiguous lowercase hex digits (`[1, 171]` → `"01ab"`). */
export function toHexString(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join(
    "",
  );
}

/** Format a register address as four lowercase hex digits (`"0x003b"`). */
export function formatAddress(address: number): string {
  return `0x${address.toString(16).padStart(4, "0")}`;
}

/** Format bytes as a bracketed list (`"[0x01, 0xAB]"`). */
export function formatHexBytes(bytes: Uint8Array): string {
  const items = Array.from(
    bytes,
    (byte) => `0x${byte.toString(16).toUpperCase().padStart(2, "0")}`,
  );
  return `[${items.join(", ")}]`;
}

/**
 * Parse a bracketed byte list as produced by {@link formatHexBytes}.
 *
 * Items may omit the `0x` prefix; items that are not one or two hex digits
 * are skipped.
 */
export function parseHexByteList(text: string): Uint8Array {
  const bytes: number[] = [];
  for (const item of text.replace(/[[\]]/g, "").split(",")) {
    const token = item.trim().replace(/^0[xX]/, "");
    if (token.length > 0 && token.length <= 2 && HEX_DIGITS.test(token)) {
      bytes.push(Number.parseInt(token, 16));
    }
  }
  return Uint8Array.from(bytes);
}

/** Space-separated uppercase hex dump for debug logs (`"0A 00 0E"`). */
export function formatHexDump(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) =>
    byte.toString(16).toUpperCase().padStart(2, "0"),
  ).join(" ");
}
