// Register-bus backend: two-wire bus transactions against the DSP.
//
// Read  = write 2-byte BE address pointer, then read `length` bytes.
// Write = one transaction of address pointer + payload.

import { BackendError, toError } from "../errors.ts";
import type { Logger } from "../logger.ts";
import { silentLogger } from "../logger.ts";
import { AsyncLock } from "../lock.ts";
import { formatAddress } from "../utils/hex.ts";
import {
  type Backend,
  type BusBackendConfig,
  validateAccess,
} from "./backend.ts";

/** Raw bus operations addressed to one 7-bit device address. */
export interface RegisterBus {
  write(device: number, bytes: Uint8Array): Promise<void>;
  read(device: number, length: number): Promise<Uint8Array>;
  close?(): Promise<void>;
}

export interface RegisterBusBackendOptions {
  /** Opens the bus on first use. */
  openBus: () => Promise<RegisterBus>;
  logger?: Logger;
}

function pointerBytes(address: number): Uint8Array {
  return Uint8Array.of((address >> 8) & 0xff, address & 0xff);
}

/**
 * Backend that owns the bus handle. Every transaction, including both phases
 * of a read, runs under one lock so concurrent connections never interleave
 * on the wire.
 */
export class RegisterBusBackend implements Backend {
  private readonly lock = new AsyncLock();
  private readonly logger: Logger;
  private readonly openBus: () => Promise<RegisterBus>;
  private bus: RegisterBus | undefined;
  private closed = false;

  constructor(
    public readonly config: BusBackendConfig,
    options: RegisterBusBackendOptions,
  ) {
    this.openBus = options.openBus;
    this.logger = (options.logger ?? silentLogger).child({
      backend: "bus",
      busNumber: config.busNumber,
      device: `0x${config.deviceAddress.toString(16)}`,
    });
  }

  async read(address: number, length: number): Promise<Uint8Array> {
    validateAccess(address, length);
    return this.transaction("read", address, async (bus) => {
      await bus.write(this.config.deviceAddress, pointerBytes(address));
      return bus.read(this.config.deviceAddress, length);
    });
  }

  async write(address: number, data: Uint8Array): Promise<void> {
    validateAccess(address, data.length);
    const frame = new Uint8Array(2 + data.length);
    frame.set(pointerBytes(address), 0);
    frame.set(data, 2);
    await this.transaction("write", address, (bus) =>
      bus.write(this.config.deviceAddress, frame),
    );
  }

  async close(): Promise<void> {
    await this.lock.withLock(async () => {
      this.closed = true;
      const bus = this.bus;
      this.bus = undefined;
      await bus?.close?.();
    });
  }

  private async transaction<T>(
    operation: "read" | "write",
    address: number,
    fn: (bus: RegisterBus) => Promise<T>,
  ): Promise<T> {
    return this.lock.withLock(async () => {
      if (this.closed) {
        throw new BackendError("Register bus is closed");
      }
      try {
        const bus = (this.bus ??= await this.openBus());
        return await fn(bus);
      } catch (error) {
        if (error instanceof BackendError) throw error;
        const message = `Bus ${operation} at ${formatAddress(address)} failed: ${toError(error).message}`;
        this.logger.warn(message);
        throw new BackendError(message, { cause: error });
      }
    });
  }
}
