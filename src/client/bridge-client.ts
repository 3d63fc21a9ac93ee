/**
 * Client side of the register protocol: sends Read/Write commands and waits
 * for the matching Response frame.
 *
 * Requests are strictly sequential, as the bridge answers in command order
 * and never pipelines. A call made while another is pending fails with
 * {@link BusyError} instead of queueing.
 */

import { connect } from "node:net";
import { createErr, createOk, type Result } from "option-t/plain_result";
import {
  type ByteSink,
  byteStreamFromSocket,
  socketSink,
} from "../connection/stream.ts";
import {
  BackendError,
  BusyError,
  ConnectionIOError,
  toError,
} from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { RESPONSE_STATUS } from "../protocol/constants.ts";
import {
  encodeReadCommand,
  encodeWriteCommand,
} from "../protocol/frameBuilder.ts";
import type { ResponseFrame } from "../protocol/types.ts";
import { responseFrameStream } from "./response-stream.ts";

/** Byte transport a client runs over. */
export interface ClientTransport {
  source: AsyncIterable<Uint8Array>;
  sink: ByteSink;
  close?: () => Promise<void> | void;
}

export interface WriteOptions {
  safeload?: number;
  channel?: number;
}

export type ClientError = BusyError | ConnectionIOError | BackendError;

export class BridgeClient {
  private readonly frames: AsyncIterator<ResponseFrame, void>;
  private pending = false;

  constructor(private readonly transport: ClientTransport) {
    this.frames = responseFrameStream(transport.source)[Symbol.asyncIterator]();
  }

  /** Open a TCP connection to a bridge and wrap it in a client. */
  static async connect(
    host: string,
    port: number,
    logger?: Logger,
  ): Promise<BridgeClient> {
    return new BridgeClient(await connectTcp(host, port, logger));
  }

  /** True while a request waits for its response. */
  get busy(): boolean {
    return this.pending;
  }

  /** Read `length` bytes at `address` of device `chip`. */
  async read(
    chip: number,
    address: number,
    length: number,
  ): Promise<Result<Uint8Array, ClientError>> {
    const frame = encodeReadCommand({
      chipAddress: chip,
      dataLength: length,
      paramAddress: address,
    });
    return this.exchange(frame, (response) => response.payload);
  }

  /** Write `payload` at `address` of device `chip`. */
  async write(
    chip: number,
    address: number,
    payload: Uint8Array,
    options: WriteOptions = {},
  ): Promise<Result<void, ClientError>> {
    const frame = encodeWriteCommand({
      channel: options.channel,
      chipAddress: chip,
      paramAddress: address,
      payload,
      safeload: options.safeload,
    });
    return this.exchange(frame, () => undefined);
  }

  async close(): Promise<void> {
    await this.transport.close?.();
    await this.frames.return?.();
  }

  private async exchange<T>(
    command: Uint8Array,
    extract: (response: ResponseFrame) => T,
  ): Promise<Result<T, ClientError>> {
    if (this.pending) {
      return createErr(new BusyError());
    }
    this.pending = true;
    try {
      await this.transport.sink.write(command);
      const next = await this.frames.next();
      if (next.done) {
        return createErr(
          new ConnectionIOError("Connection closed before a response arrived"),
        );
      }
      const response = next.value;
      if (response.success !== RESPONSE_STATUS.OK) {
        return createErr(
          new BackendError(
            `Bridge reported failure for address 0x${response.paramAddress.toString(16).padStart(4, "0")}`,
          ),
        );
      }
      return createOk(extract(response));
    } catch (error) {
      if (error instanceof ConnectionIOError) return createErr(error);
      return createErr(
        new ConnectionIOError(toError(error).message, { cause: error }),
      );
    } finally {
      this.pending = false;
    }
  }
}

/** Connect to `host:port` and expose the socket as a client transport. */
export async function connectTcp(
  host: string,
  port: number,
  logger: Logger = silentLogger,
): Promise<ClientTransport> {
  const socket = connect({ host, port });
  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(
        new ConnectionIOError(
          `Failed to connect to ${host}:${port}: ${err.message}`,
          { cause: err },
        ),
      );
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve();
    });
  });
  // Errors also surface through the byte stream once it is read.
  socket.on("error", (err) => {
    logger.debug("Client socket error", { error: err.message, host, port });
  });
  return {
    close: () =>
      new Promise<void>((resolve) => {
        socket.end(() => resolve());
      }),
    sink: socketSink(socket),
    source: byteStreamFromSocket(socket),
  };
}
