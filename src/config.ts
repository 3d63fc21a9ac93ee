/**
 * Process configuration read from environment variables.
 */

import { z } from "zod";
import type { BackendConfig } from "./backend/backend.ts";
import type {
  ConnectionOptions,
  ErrorReplyPolicy,
  ReadPaddingPolicy,
  ResyncPolicy,
} from "./connection/connection-handler.ts";
import { ConfigError } from "./errors.ts";
import type { LogLevel } from "./logger.ts";
import {
  DEFAULT_BUFFER_CAPACITY,
  DEFAULT_HTTP_PORT,
  DEFAULT_TCP_PORT,
  WRITE_HEADER_SIZE,
} from "./protocol/constants.ts";
import { parseNumber } from "./utils/hex.ts";

/** Integer written as decimal or 0x-prefixed hex. */
const integer = (min: number, max: number) =>
  z
    .string()
    .trim()
    .transform((value, ctx) => {
      const parsed = parseNumber(value, max);
      if (parsed === undefined || parsed < min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected an integer between ${min} and ${max}`,
        });
        return z.NEVER;
      }
      return parsed;
    });

const envSchema = z
  .object({
    BRIDGE_BACKEND: z.enum(["mock", "bus", "http"]).default("mock"),
    BRIDGE_BUFFER_SIZE: integer(WRITE_HEADER_SIZE, 0x7fffffff).default(
      String(DEFAULT_BUFFER_CAPACITY),
    ),
    BRIDGE_ERROR_REPLY: z.enum(["none", "failure-response"]).default("none"),
    BRIDGE_HOST: z.string().min(1).default("0.0.0.0"),
    BRIDGE_HTTP_BASE_URL: z.string().url().optional(),
    BRIDGE_HTTP_PORT: integer(0, 65535).default(String(DEFAULT_HTTP_PORT)),
    BRIDGE_I2C_ADDRESS: integer(0x03, 0x77).default("0x3b"),
    BRIDGE_I2C_BUS: integer(0, 255).default("1"),
    BRIDGE_MOCK_FILL: integer(0, 255).default("12"),
    BRIDGE_READ_PADDING: z.enum(["keep", "declared-length"]).default("keep"),
    BRIDGE_RESYNC: z.enum(["drop-byte", "drop-buffer"]).default("drop-buffer"),
    BRIDGE_TCP_PORT: integer(0, 65535).default(String(DEFAULT_TCP_PORT)),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .refine(
    (env) =>
      env.BRIDGE_BACKEND !== "http" || env.BRIDGE_HTTP_BASE_URL !== undefined,
    {
      message: "BRIDGE_HTTP_BASE_URL is required when BRIDGE_BACKEND=http",
      path: ["BRIDGE_HTTP_BASE_URL"],
    },
  );

/** Resolved configuration of one bridge process. */
export interface BridgeConfig {
  host: string;
  tcpPort: number;
  httpPort: number;
  logLevel: LogLevel;
  backend: BackendConfig;
  connection: Required<Omit<ConnectionOptions, "logger">>;
}

function toBackendConfig(env: z.infer<typeof envSchema>): BackendConfig {
  switch (env.BRIDGE_BACKEND) {
    case "bus":
      return {
        busNumber: env.BRIDGE_I2C_BUS,
        deviceAddress: env.BRIDGE_I2C_ADDRESS,
        type: "bus",
      };
    case "http":
      return { baseUrl: env.BRIDGE_HTTP_BASE_URL ?? "", type: "http" };
    case "mock":
      return { fillValue: env.BRIDGE_MOCK_FILL, type: "mock" };
  }
}

/**
 * Validate `env` and build the bridge configuration.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): BridgeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(
      `Invalid environment configuration: ${issues.join("; ")}`,
      issues,
    );
  }

  const data = result.data;
  const resync: ResyncPolicy = data.BRIDGE_RESYNC;
  const readPadding: ReadPaddingPolicy = data.BRIDGE_READ_PADDING;
  const errorReply: ErrorReplyPolicy = data.BRIDGE_ERROR_REPLY;

  return {
    backend: toBackendConfig(data),
    connection: {
      bufferCapacity: data.BRIDGE_BUFFER_SIZE,
      errorReply,
      readPadding,
      resync,
    },
    host: data.BRIDGE_HOST,
    httpPort: data.BRIDGE_HTTP_PORT,
    logLevel: data.LOG_LEVEL,
    tcpPort: data.BRIDGE_TCP_PORT,
  };
}
