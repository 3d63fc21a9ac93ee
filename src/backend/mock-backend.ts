// Mock backend for development without hardware and for tests.
// Reads return a fixed fill byte; writes are accepted and recorded.

import { BackendError } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { formatAddress, formatHexBytes } from "../utils/hex.ts";
import {
  type Backend,
  type MockBackendConfig,
  validateAccess,
} from "./backend.ts";

/** Fill byte used when the config does not name one. */
export const DEFAULT_MOCK_FILL = 12;

/** Options controlling test behaviour of {@link MockBackend}. */
export interface MockBackendOptions {
  logger?: Logger;
  /** When true `read()` rejects with `errorMessage`. */
  shouldFailRead?: boolean;
  /** When true `write()` rejects with `errorMessage`. */
  shouldFailWrite?: boolean;
  /** Error message used for simulated failures. */
  errorMessage?: string;
  /** Artificial delay applied to every operation (ms). */
  delay?: number;
}

/** One write observed by the mock. */
export interface RecordedWrite {
  address: number;
  data: Uint8Array;
}

/**
 * In-memory backend with deterministic reads and recorded writes.
 */
export class MockBackend implements Backend {
  readonly writes: RecordedWrite[] = [];
  readonly reads: { address: number; length: number }[] = [];
  private readonly options: Required<Omit<MockBackendOptions, "logger">>;
  private readonly logger: Logger;

  constructor(
    public readonly config: MockBackendConfig = { type: "mock" },
    options: MockBackendOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger).child({
      backend: "mock",
    });
    this.options = {
      delay: options.delay ?? 0,
      errorMessage: options.errorMessage ?? "Mock backend failure",
      shouldFailRead: options.shouldFailRead ?? false,
      shouldFailWrite: options.shouldFailWrite ?? false,
    };
  }

  get fillValue(): number {
    return this.config.fillValue ?? DEFAULT_MOCK_FILL;
  }

  async read(address: number, length: number): Promise<Uint8Array> {
    validateAccess(address, length);
    await this.pause();
    if (this.options.shouldFailRead) {
      throw new BackendError(this.options.errorMessage);
    }
    this.reads.push({ address, length });
    this.logger.debug("Mock read", { address: formatAddress(address), length });
    return new Uint8Array(length).fill(this.fillValue);
  }

  async write(address: number, data: Uint8Array): Promise<void> {
    validateAccess(address, data.length);
    await this.pause();
    if (this.options.shouldFailWrite) {
      throw new BackendError(this.options.errorMessage);
    }
    this.writes.push({ address, data: new Uint8Array(data) });
    this.logger.info("Mock write", {
      address: formatAddress(address),
      data: formatHexBytes(data),
    });
  }

  // Testing utilities
  /** Toggle simulated failures after construction. */
  setFailures(failures: { read?: boolean; write?: boolean }): void {
    if (failures.read !== undefined) {
      this.options.shouldFailRead = failures.read;
    }
    if (failures.write !== undefined) {
      this.options.shouldFailWrite = failures.write;
    }
  }

  /** The most recent recorded write, if any. */
  getLastWrite(): RecordedWrite | undefined {
    return this.writes[this.writes.length - 1];
  }

  private async pause(): Promise<void> {
    if (this.options.delay > 0) {
      await new Promise<void>((resolve) =>
        setTimeout(resolve, this.options.delay),
      );
    }
  }
}
