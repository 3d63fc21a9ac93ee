/**
 * Per-connection reassembly loop.
 *
 * Bytes arrive in arbitrary fragments and are appended to a fixed-capacity
 * buffer. After every append the unconsumed suffix is drained: complete
 * commands run against the shared backend one at a time, their responses are
 * written in command order, and whatever remains is compacted to the front.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import type { Backend } from "../backend/backend.ts";
import {
  BufferOverflowError,
  ConnectionIOError,
  toError,
} from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import {
  DEFAULT_BUFFER_CAPACITY,
  RESPONSE_HEADER_SIZE,
} from "../protocol/constants.ts";
import {
  createFailureResponse,
  encodeResponse,
} from "../protocol/frameBuilder.ts";
import {
  countZeroPadding,
  declaredReadPadding,
  parseCommand,
} from "../protocol/frameParser.ts";
import type { Command } from "../protocol/types.ts";
import { formatHexDump } from "../utils/hex.ts";
import { dispatchCommand } from "./dispatch.ts";
import type { ByteSink } from "./stream.ts";

/** What to discard when the first buffered byte is not a known opcode. */
export type ResyncPolicy = "drop-byte" | "drop-buffer";

/** Whether zero bytes trailing a read command are skipped as padding. */
export type ReadPaddingPolicy = "keep" | "declared-length";

/** Whether a backend failure is reported to the peer. */
export type ErrorReplyPolicy = "none" | "failure-response";

export interface ConnectionOptions {
  /** Buffer size in bytes; one command must fit. */
  bufferCapacity?: number;
  resync?: ResyncPolicy;
  readPadding?: ReadPaddingPolicy;
  errorReply?: ErrorReplyPolicy;
  logger?: Logger;
}

export type ConnectionState = "reading" | "draining" | "closed";

export interface ConnectionStats {
  /** Commands decoded and executed. */
  commands: number;
  bytesIn: number;
  bytesOut: number;
  /** Unknown opcode bytes seen (one per resync). */
  invalidOpcodes: number;
  backendFailures: number;
}

export class ConnectionHandler {
  readonly stats: ConnectionStats = {
    backendFailures: 0,
    bytesIn: 0,
    bytesOut: 0,
    commands: 0,
    invalidOpcodes: 0,
  };
  private readonly buffer: Uint8Array;
  private length = 0;
  private paddingRemaining = 0;
  private _state: ConnectionState = "reading";
  private readonly resync: ResyncPolicy;
  private readonly readPadding: ReadPaddingPolicy;
  private readonly errorReply: ErrorReplyPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly backend: Backend,
    private readonly sink: ByteSink,
    options: ConnectionOptions = {},
  ) {
    this.buffer = new Uint8Array(
      options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY,
    );
    this.resync = options.resync ?? "drop-buffer";
    this.readPadding = options.readPadding ?? "keep";
    this.errorReply = options.errorReply ?? "none";
    this.logger = options.logger ?? silentLogger;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Bytes received but not yet consumed by a command. */
  get buffered(): number {
    return this.length;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Append a chunk and drain every complete command it finishes.
   *
   * A chunk larger than the free space is taken in pieces, draining between
   * them.
   *
   * @throws BufferOverflowError when the buffer is full and nothing in it
   *   can be consumed.
   * @throws ConnectionIOError when the sink rejects.
   */
  async receive(chunk: Uint8Array): Promise<void> {
    if (this._state === "closed") {
      throw new ConnectionIOError("Connection is closed");
    }
    this.stats.bytesIn += chunk.length;

    let offset = 0;
    while (offset < chunk.length) {
      const free = this.buffer.length - this.length;
      if (free === 0) {
        throw new BufferOverflowError(this.buffer.length);
      }
      const n = Math.min(free, chunk.length - offset);
      this.buffer.set(chunk.subarray(offset, offset + n), this.length);
      this.length += n;
      offset += n;
      await this.drain();
      if (this.state === "closed") return;
    }
  }

  /**
   * Feed every chunk of `source` until it ends, then close.
   *
   * Resolves with the connection statistics, or with the I/O or overflow
   * error that ended this connection.
   */
  async run(
    source: AsyncIterable<Uint8Array>,
  ): Promise<Result<ConnectionStats, ConnectionIOError | BufferOverflowError>> {
    try {
      for await (const chunk of source) {
        await this.receive(chunk);
      }
      return createOk(this.stats);
    } catch (error) {
      if (
        error instanceof ConnectionIOError ||
        error instanceof BufferOverflowError
      ) {
        return createErr(error);
      }
      return createErr(
        new ConnectionIOError(toError(error).message, { cause: error }),
      );
    } finally {
      this.close();
    }
  }

  /** Drop buffered bytes and refuse further input. */
  close(): void {
    if (this._state === "closed") return;
    this._state = "closed";
    if (this.length > 0) {
      this.logger.debug("Discarding unconsumed bytes on close", {
        bytes: this.length,
      });
    }
    this.length = 0;
    this.paddingRemaining = 0;
  }

  private async drain(): Promise<void> {
    this._state = "draining";
    let start = 0;
    try {
      while (start < this.length) {
        const view = this.buffer.subarray(start, this.length);

        if (this.paddingRemaining > 0) {
          const zeros = countZeroPadding(view, this.paddingRemaining);
          if (zeros === this.paddingRemaining) {
            this.logger.debug("Skipped read padding", { bytes: zeros });
            start += zeros;
            this.paddingRemaining = 0;
            continue;
          }
          // All zero so far but short: wait for the rest.
          if (zeros === view.length) break;
          this.paddingRemaining = 0;
        }

        const parsed = parseCommand(view);
        if (isErr(parsed)) {
          const error = unwrapErr(parsed);
          this.stats.invalidOpcodes++;
          this.logger.warn(error.message, {
            discarded: this.resync === "drop-byte" ? 1 : view.length,
            policy: this.resync,
          });
          if (this.resync === "drop-byte") {
            start += 1;
            continue;
          }
          start = this.length;
          break;
        }

        const decoded = unwrapOk(parsed);
        if (!decoded.done) break;

        start += decoded.consumed;
        await this.execute(decoded.value);
        if (
          decoded.value.kind === "read" &&
          this.readPadding === "declared-length"
        ) {
          this.paddingRemaining = declaredReadPadding(decoded.value);
        }
      }
    } finally {
      // close() may have run while a command was in flight.
      if (this.state !== "closed") {
        if (start > 0) {
          this.buffer.copyWithin(0, start, this.length);
          this.length -= start;
        }
        this._state = "reading";
      }
    }
  }

  private async execute(command: Command): Promise<void> {
    this.stats.commands++;
    this.logger.debug("Command received", {
      address: command.paramAddress,
      chip: command.chipAddress,
      kind: command.kind,
      length: command.dataLength,
    });

    const response = await dispatchCommand(
      this.backend,
      command,
      this.buffer.length,
    );
    if (response.kind === "error") {
      this.stats.backendFailures++;
      this.logger.error(response.message, { kind: command.kind });
      if (this.errorReply === "failure-response") {
        await this.send(encodeResponse(createFailureResponse(command)));
      }
      return;
    }

    const bytes = encodeResponse(response);
    this.logger.debug("Response sent", {
      head: formatHexDump(bytes.subarray(0, RESPONSE_HEADER_SIZE)),
      length: bytes.length,
    });
    await this.send(bytes);
  }

  private async send(bytes: Uint8Array): Promise<void> {
    try {
      await this.sink.write(bytes);
    } catch (error) {
      if (error instanceof ConnectionIOError) throw error;
      throw new ConnectionIOError(
        `Failed to write response: ${toError(error).message}`,
        { cause: error },
      );
    }
    this.stats.bytesOut += bytes.length;
  }
}
