/**
 * {@link RegisterBus} implementation over the `i2c-bus` package (Linux
 * `/dev/i2c-N`).
 *
 * The package is a native optional dependency, so it is imported on first
 * use rather than at module load.
 */

import { BackendError, toError } from "../errors.ts";
import type { RegisterBus } from "./register-bus-backend.ts";

export async function openI2cBus(busNumber: number): Promise<RegisterBus> {
  let i2c: typeof import("i2c-bus");
  try {
    i2c = await import("i2c-bus");
  } catch (error) {
    throw new BackendError("The i2c-bus package is not available", {
      cause: error,
    });
  }

  const bus = await i2c.openPromisified(busNumber).catch((error: unknown) => {
    throw new BackendError(
      `Failed to open /dev/i2c-${busNumber}: ${toError(error).message}`,
      { cause: error },
    );
  });

  return {
    async close() {
      await bus.close();
    },
    async read(device, length) {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await bus.i2cRead(device, length, buffer);
      if (bytesRead !== length) {
        throw new BackendError(
          `Short read from device 0x${device.toString(16)}: ${bytesRead} of ${length} bytes`,
        );
      }
      return new Uint8Array(buffer.buffer, buffer.byteOffset, bytesRead);
    },
    async write(device, bytes) {
      const buffer = Buffer.from(bytes);
      const { bytesWritten } = await bus.i2cWrite(device, buffer.length, buffer);
      if (bytesWritten !== buffer.length) {
        throw new BackendError(
          `Short write to device 0x${device.toString(16)}: ${bytesWritten} of ${buffer.length} bytes`,
        );
      }
    },
  };
}
