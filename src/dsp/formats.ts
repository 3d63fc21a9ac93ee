/**
 * Number formats and measurement units of DSP parameter registers.
 *
 * All formats occupy one 4-byte big-endian word.
 */

import { RegisterFormatError } from "../errors.ts";

export const NUMBER_FORMATS = ["Int8_24", "Int28_0", "Int32_0"] as const;

export type NumberFormat = (typeof NUMBER_FORMATS)[number];

export const MEASUREMENT_UNITS = ["decibel", "none"] as const;

export type MeasurementUnit = (typeof MEASUREMENT_UNITS)[number];

/** Bytes per register word. */
export const WORD_SIZE = 4;

const FIXED_POINT_SCALE = 2 ** 24;
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/** Display label, e.g. `Int8.24`. */
export function formatLabel(format: NumberFormat): string {
  return format.replace("_", ".");
}

export function unitLabel(unit: MeasurementUnit): string {
  return unit === "decibel" ? "dB" : "";
}

/** Truncate toward zero into the signed 32-bit range; NaN becomes 0. */
function toInt32(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value >= INT32_MAX) return INT32_MAX;
  if (value <= INT32_MIN) return INT32_MIN;
  return Math.trunc(value);
}

/**
 * Encode a value as one register word.
 *
 * Int8_24 scales by 2^24 first; out-of-range values saturate.
 */
export function valueToBytes(format: NumberFormat, value: number): Uint8Array {
  const scaled = format === "Int8_24" ? value * FIXED_POINT_SCALE : value;
  const bytes = new Uint8Array(WORD_SIZE);
  new DataView(bytes.buffer).setInt32(0, toInt32(scaled));
  return bytes;
}

/** Decode one register word. */
export function bytesToValue(format: NumberFormat, bytes: Uint8Array): number {
  if (bytes.length !== WORD_SIZE) {
    throw new RegisterFormatError(
      `${formatLabel(format)} needs ${WORD_SIZE} bytes, got ${bytes.length}`,
    );
  }
  const raw = new DataView(
    bytes.buffer,
    bytes.byteOffset,
    bytes.byteLength,
  ).getInt32(0);
  return format === "Int8_24" ? raw / FIXED_POINT_SCALE : raw;
}

/**
 * Convert a user-facing value to the linear value stored in the register.
 *
 * Decibels go through 10^(v/20) here but come back through 10*log10(v) in
 * {@link fromRaw}; gain sliders and level meters on the device disagree on
 * the scale.
 */
export function toRaw(unit: MeasurementUnit, value: number): number {
  return unit === "decibel" ? 10 ** (value / 20) : value;
}

/** Convert a stored linear value to its user-facing value. */
export function fromRaw(unit: MeasurementUnit, value: number): number {
  return unit === "decibel" ? 10 * Math.log10(value) : value;
}
