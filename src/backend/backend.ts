/**
 * Backend abstraction: the register-access capability shared by every
 * connection of a bridge process.
 *
 * Implementations are selected once at startup from a discriminated config
 * union through {@link BackendRegistry}; callers only ever see the narrow
 * `read` / `write` surface.
 */

import { BackendError } from "../errors.ts";
import type { Logger } from "../logger.ts";
import { MAX_PARAM_ADDRESS } from "../protocol/constants.ts";

/** Register bus reached through a Linux `/dev/i2c-N` device. */
export interface BusBackendConfig {
  type: "bus";
  busNumber: number;
  /** 7-bit device address of the DSP on the bus. */
  deviceAddress: number;
}

/** In-memory backend answering every read with a fixed byte. */
export interface MockBackendConfig {
  type: "mock";
  fillValue?: number;
}

/** Another bridge reached through its HTTP API. */
export interface HttpBackendConfig {
  type: "http";
  baseUrl: string;
}

/** Discriminated union of all backend configurations. */
export type BackendConfig =
  | BusBackendConfig
  | MockBackendConfig
  | HttpBackendConfig;

export type BackendType = BackendConfig["type"];

/**
 * Register access capability.
 *
 * Both operations reject with {@link BackendError}; a rejected call leaves
 * the backend usable for the next one.
 */
export interface Backend {
  readonly config: BackendConfig;
  /** Read `length` bytes starting at the 16-bit register `address`. */
  read(address: number, length: number): Promise<Uint8Array>;
  /** Write `data` starting at the 16-bit register `address`. */
  write(address: number, data: Uint8Array): Promise<void>;
  /** Release underlying resources (bus handle, pending requests). */
  close?(): Promise<void>;
}

/**
 * Reject addresses outside 0..0xFFFF and negative or fractional lengths
 * before any I/O happens.
 */
export function validateAccess(address: number, length: number): void {
  if (
    !Number.isInteger(address) ||
    address < 0 ||
    address > MAX_PARAM_ADDRESS
  ) {
    throw new BackendError(`Register address out of range: ${address}`);
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new BackendError(`Invalid transfer length: ${length}`);
  }
}

/** Options every factory receives besides its config. */
export interface BackendFactoryContext {
  logger: Logger;
}

/** Factory responsible for instantiating a backend for `config`. */
export type BackendFactory<T extends BackendConfig = BackendConfig> = (
  config: T,
  context: BackendFactoryContext,
) => Backend;

type ConfigOf<K extends BackendType> = Extract<BackendConfig, { type: K }>;

function isConfigOf<K extends BackendType>(
  type: K,
  config: BackendConfig,
): config is ConfigOf<K> {
  return config.type === type;
}

const factories = new Map<BackendType, BackendFactory>();

/**
 * Registry of backend factories keyed by config discriminator.
 *
 * Typical usage: `BackendRegistry.register("mock", (cfg) => new MockBackend(cfg))`.
 */
export const BackendRegistry = {
  /** Create a concrete backend for the given config. */
  create(config: BackendConfig, context: BackendFactoryContext): Backend {
    const factory = factories.get(config.type);
    if (!factory) {
      throw new BackendError(`Unknown backend type: ${config.type}`);
    }
    return factory(config, context);
  },

  /** List currently registered backend discriminators. */
  getRegisteredTypes(): BackendType[] {
    return Array.from(factories.keys());
  },

  /** Register (or overwrite) the factory for a discriminator. */
  register<K extends BackendType>(
    type: K,
    factory: BackendFactory<ConfigOf<K>>,
  ): void {
    factories.set(type, (config, context) => {
      if (!isConfigOf(type, config)) {
        throw new BackendError(`Invalid config type for ${type} backend`);
      }
      return factory(config, context);
    });
  },
} as const;
