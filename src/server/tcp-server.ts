/**
 * TCP front end: one {@link ConnectionHandler} per accepted socket, all of
 * them sharing a single backend.
 */

import { type AddressInfo, createServer, type Server, type Socket } from "node:net";
import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import type { Backend } from "../backend/backend.ts";
import {
  ConnectionHandler,
  type ConnectionOptions,
} from "../connection/connection-handler.ts";
import { byteStreamFromSocket, socketSink } from "../connection/stream.ts";
import { BridgeError } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { DEFAULT_TCP_PORT } from "../protocol/constants.ts";

export interface TcpServerOptions {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  connection?: Omit<ConnectionOptions, "logger">;
  logger?: Logger;
}

interface Session {
  socket: Socket;
  abort: AbortController;
  done: Promise<void>;
}

export class BridgeTcpServer {
  private server: Server | undefined;
  private readonly sessions = new Set<Session>();
  private readonly logger: Logger;
  private nextId = 1;

  constructor(
    private readonly backend: Backend,
    private readonly options: TcpServerOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger).child({
      component: "tcp",
    });
  }

  /** Number of connections currently being served. */
  get connectionCount(): number {
    return this.sessions.size;
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Start listening; resolves with the bound address. */
  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new BridgeError("TCP server already started", "ALREADY_STARTED");
    }
    // Half-open: a peer that sends FIN still gets answers to what it sent.
    const server = createServer({ allowHalfOpen: true }, (socket) =>
      this.accept(socket),
    );
    server.on("error", (err) => {
      this.logger.error("TCP server error", { error: err.message });
    });
    this.server = server;

    const host = this.options.host ?? "0.0.0.0";
    const port = this.options.port ?? DEFAULT_TCP_PORT;
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        resolve();
      });
    }).catch((err: unknown) => {
      this.server = undefined;
      throw err;
    });

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new BridgeError("TCP server has no network address");
    }
    this.logger.info("Server listening", {
      host: address.address,
      port: address.port,
    });
    return address;
  }

  /** Stop accepting, end every active session and wait for them to finish. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    const sessions = [...this.sessions];
    for (const session of sessions) {
      session.abort.abort();
      session.socket.destroy();
    }
    await Promise.all(sessions.map((session) => session.done));
    await closed;
    this.logger.info("Server stopped");
  }

  private accept(socket: Socket): void {
    const id = this.nextId++;
    const logger = this.logger.child({
      connection: id,
      peer: `${socket.remoteAddress}:${socket.remotePort}`,
    });
    logger.info("Client connected");

    // Errors surface through the byte stream; this keeps late ones from
    // becoming uncaught exceptions.
    socket.on("error", (err) => {
      logger.debug("Socket error", { error: err.message });
    });

    const abort = new AbortController();
    const handler = new ConnectionHandler(this.backend, socketSink(socket), {
      ...this.options.connection,
      logger,
    });
    const session: Session = {
      abort,
      done: handler
        .run(byteStreamFromSocket(socket, { signal: abort.signal }))
        .then((result) => {
          if (isErr(result)) {
            logger.warn("Connection ended with error", {
              error: unwrapErr(result).message,
            });
            socket.destroy();
          } else {
            logger.info("Client disconnected", { ...unwrapOk(result) });
            if (!socket.destroyed) socket.end();
          }
        })
        .finally(() => {
          this.sessions.delete(session);
        }),
      socket,
    };
    this.sessions.add(session);
  }
}
