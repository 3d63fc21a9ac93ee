/**
 * Adapters between Node streams and the byte source / sink pair the
 * connection handler and the client work on.
 *
 * Keeps socket plumbing separate from the framing logic.
 */
import type { Readable, Writable } from "node:stream";
import { ConnectionIOError } from "../errors.ts";

/** Destination for encoded frames; resolves once the bytes are handed off. */
export interface ByteSink {
  write(data: Uint8Array): Promise<void>;
}

export interface ByteStreamOptions {
  /** Ends the iteration early; queued chunks are discarded. */
  signal?: AbortSignal;
  /** Queue length at which the socket is paused until the consumer catches up. */
  highWaterMark?: number;
}

/**
 * Convert a readable socket into an async iterable of raw chunks.
 *
 * The iterable completes when:
 *  - the peer ends the stream or the socket closes
 *  - the AbortSignal aborts
 *
 * and throws {@link ConnectionIOError} when the socket emits `error`.
 */
export async function* byteStreamFromSocket(
  socket: Readable,
  options: ByteStreamOptions = {},
): AsyncGenerator<Uint8Array, void, unknown> {
  const { signal } = options;
  const highWaterMark = options.highWaterMark ?? 16;
  const queue: Uint8Array[] = [];
  let resolve: (() => void) | undefined;
  let done = false;
  let aborted = signal?.aborted ?? false;
  let error: ConnectionIOError | undefined;

  const wake = () => {
    if (resolve) {
      const r = resolve;
      resolve = undefined;
      r();
    }
  };

  const onData = (chunk: Buffer | string) => {
    queue.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    if (queue.length >= highWaterMark) {
      socket.pause();
    }
    wake();
  };
  const onEnd = () => {
    done = true;
    wake();
  };
  const onError = (err: Error) => {
    if (!done) {
      error = new ConnectionIOError(`Socket error: ${err.message}`, {
        cause: err,
      });
      done = true;
      wake();
    }
  };
  const onAbort = () => {
    aborted = true;
    wake();
  };

  if (aborted) return;

  socket.on("data", onData);
  socket.on("end", onEnd);
  socket.on("close", onEnd);
  socket.on("error", onError);
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (!aborted) {
      const item = queue.shift();
      if (item) {
        if (queue.length < highWaterMark && socket.isPaused()) {
          socket.resume();
        }
        yield item;
        continue;
      }
      if (done) break;
      await new Promise<void>((r) => {
        resolve = r;
      });
    }
    if (error && !aborted) {
      throw error;
    }
  } finally {
    socket.off("data", onData);
    socket.off("end", onEnd);
    socket.off("close", onEnd);
    socket.off("error", onError);
    signal?.removeEventListener("abort", onAbort);
  }
}

/** Sink that writes to `socket` and resolves when the write is flushed. */
export function socketSink(socket: Writable): ByteSink {
  return {
    write(data: Uint8Array): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        socket.write(data, (err) => {
          if (err) {
            reject(
              new ConnectionIOError(`Socket write failed: ${err.message}`, {
                cause: err,
              }),
            );
          } else {
            resolve();
          }
        });
      });
    },
  };
}
