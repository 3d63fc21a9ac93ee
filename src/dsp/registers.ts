import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, toError } from "../errors.ts";
import { MAX_PARAM_ADDRESS } from "../protocol/constants.ts";
import {
  bytesToValue,
  fromRaw,
  MEASUREMENT_UNITS,
  type MeasurementUnit,
  NUMBER_FORMATS,
  type NumberFormat,
  toRaw,
  valueToBytes,
} from "./formats.ts";

/** One parameter register of the DSP program. */
export interface RegisterDefinition {
  name: string;
  address: number;
  format: NumberFormat;
  /** Bounds of the user-facing value (in `unit`). */
  min: number;
  max: number;
  readOnly: boolean;
  unit: MeasurementUnit;
}

const registerSchema = z
  .object({
    address: z.number().int().min(0).max(MAX_PARAM_ADDRESS),
    format: z.enum(NUMBER_FORMATS),
    max: z.number(),
    min: z.number(),
    name: z.string().min(1),
    readOnly: z.boolean(),
    unit: z.enum(MEASUREMENT_UNITS),
  })
  .refine((register) => register.min <= register.max, {
    message: "min must not exceed max",
  });

const registerMapSchema = z.array(registerSchema);

/**
 * Validate a parsed register map.
 *
 * @throws ConfigError listing every invalid entry.
 */
export function parseRegisterMap(data: unknown): RegisterDefinition[] {
  const result = registerMapSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid register map: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/** Read and validate a register map from a JSON file. */
export function loadRegisterMap(path: string | URL): RegisterDefinition[] {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot read register map ${String(path)}: ${toError(error).message}`,
    );
  }
  return parseRegisterMap(data);
}

/** Register map of the stock DSP program. */
export function defaultRegisterMap(): RegisterDefinition[] {
  return loadRegisterMap(new URL("./registers.json", import.meta.url));
}

export function findRegister(
  registers: readonly RegisterDefinition[],
  address: number,
): RegisterDefinition | undefined {
  return registers.find((register) => register.address === address);
}

/** Decode a register word into its user-facing value. */
export function decodeRegister(
  register: RegisterDefinition,
  bytes: Uint8Array,
): number {
  return fromRaw(register.unit, bytesToValue(register.format, bytes));
}

/** Encode a user-facing value into a register word. */
export function encodeRegister(
  register: RegisterDefinition,
  value: number,
): Uint8Array {
  return valueToBytes(register.format, toRaw(register.unit, value));
}
