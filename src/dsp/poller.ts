/**
 * Periodic register reads through a backend.
 *
 * The poller owns its interval handle: `start()` creates it, `stop()` clears
 * it, and nothing else holds a reference. A tick that fires while the
 * previous one is still reading is skipped.
 */

import { createErr, createOk, type Result } from "option-t/plain_result";
import type { Backend } from "../backend/backend.ts";
import {
  BackendError,
  ReadOnlyRegisterError,
  RegisterFormatError,
  toError,
} from "../errors.ts";
import { EventEmitter } from "../events.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { formatAddress } from "../utils/hex.ts";
import { WORD_SIZE } from "./formats.ts";
import {
  decodeRegister,
  encodeRegister,
  type RegisterDefinition,
} from "./registers.ts";

export const DEFAULT_POLL_INTERVAL = 100;

type IntervalHandle = ReturnType<typeof setInterval>;

export interface RegisterPollerOptions {
  registers: readonly RegisterDefinition[];
  /** Poll only read-only registers (level meters). Defaults to true. */
  readOnlyOnly?: boolean;
  setIntervalFn?: (callback: () => void, ms: number) => IntervalHandle;
  clearIntervalFn?: (handle: IntervalHandle) => void;
  logger?: Logger;
}

export type RegisterPollerEvents = {
  value: [register: RegisterDefinition, value: number];
  error: [register: RegisterDefinition, error: Error];
};

export type WriteValueError =
  | BackendError
  | ReadOnlyRegisterError
  | RegisterFormatError;

export class RegisterPoller extends EventEmitter<RegisterPollerEvents> {
  private handle: IntervalHandle | undefined;
  private inFlight: Promise<void> | undefined;
  private skipped = 0;
  private readonly registers: readonly RegisterDefinition[];
  private readonly readOnlyOnly: boolean;
  private readonly setIntervalFn: (
    callback: () => void,
    ms: number,
  ) => IntervalHandle;
  private readonly clearIntervalFn: (handle: IntervalHandle) => void;
  private readonly logger: Logger;

  constructor(
    private readonly backend: Backend,
    options: RegisterPollerOptions,
  ) {
    super();
    this.registers = options.registers;
    this.readOnlyOnly = options.readOnlyOnly ?? true;
    this.setIntervalFn =
      options.setIntervalFn ?? ((callback, ms) => setInterval(callback, ms));
    this.clearIntervalFn =
      options.clearIntervalFn ?? ((handle) => clearInterval(handle));
    this.logger = (options.logger ?? silentLogger).child({
      component: "poller",
    });
  }

  get isRunning(): boolean {
    return this.handle !== undefined;
  }

  /** Ticks dropped because a poll was still in flight. */
  get skippedTicks(): number {
    return this.skipped;
  }

  /** Begin polling; a no-op while already running. */
  start(intervalMs = DEFAULT_POLL_INTERVAL): void {
    if (this.handle !== undefined) return;
    this.handle = this.setIntervalFn(() => this.tick(), intervalMs);
    this.logger.info("Polling started", { intervalMs });
  }

  stop(): void {
    if (this.handle === undefined) return;
    this.clearIntervalFn(this.handle);
    this.handle = undefined;
    this.logger.info("Polling stopped");
  }

  /** Resolves once the poll in flight, if any, has finished. */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  /**
   * Read every polled register once, emitting `value` or `error` for each.
   *
   * Resolves with the decoded values keyed by address; failed registers are
   * absent.
   */
  async pollOnce(): Promise<Map<number, number>> {
    const values = new Map<number, number>();
    for (const register of this.polledRegisters()) {
      try {
        const bytes = await this.backend.read(register.address, WORD_SIZE);
        const value = decodeRegister(register, bytes);
        if (Number.isNaN(value)) {
          this.logger.warn("Register decoded to NaN", {
            address: formatAddress(register.address),
            name: register.name,
          });
        }
        values.set(register.address, value);
        this.emit("value", register, value);
      } catch (error) {
        const failure = toError(error);
        const details = {
          address: formatAddress(register.address),
          error: failure.message,
          name: register.name,
        };
        // Warn only when no listener took the error.
        if (this.emit("error", register, failure)) {
          this.logger.debug("Register read failed", details);
        } else {
          this.logger.warn("Register read failed", details);
        }
      }
    }
    return values;
  }

  /** Encode `value` in the register's unit and format and write it. */
  async writeValue(
    register: RegisterDefinition,
    value: number,
  ): Promise<Result<void, WriteValueError>> {
    if (register.readOnly) {
      return createErr(new ReadOnlyRegisterError(register.name));
    }
    if (!(value >= register.min && value <= register.max)) {
      return createErr(
        new RegisterFormatError(
          `Value ${value} is outside ${register.min}..${register.max} for "${register.name}"`,
        ),
      );
    }
    try {
      await this.backend.write(
        register.address,
        encodeRegister(register, value),
      );
      return createOk(undefined);
    } catch (error) {
      return createErr(
        error instanceof BackendError
          ? error
          : new BackendError(toError(error).message, { cause: error }),
      );
    }
  }

  private polledRegisters(): RegisterDefinition[] {
    return this.readOnlyOnly
      ? this.registers.filter((register) => register.readOnly)
      : [...this.registers];
  }

  private tick(): void {
    if (this.inFlight) {
      this.skipped++;
      return;
    }
    this.inFlight = this.pollOnce().then(
      () => {
        this.inFlight = undefined;
      },
      (error: unknown) => {
        this.inFlight = undefined;
        this.logger.error("Poll failed", { error: toError(error).message });
      },
    );
  }
}
