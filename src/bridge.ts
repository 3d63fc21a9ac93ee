/**
 * Wires one bridge process together: a backend chosen by config, the TCP
 * protocol server and the HTTP API, all sharing that backend.
 */

import type { AddressInfo } from "node:net";
import { type Backend, BackendRegistry } from "./backend/index.ts";
import type { BridgeConfig } from "./config.ts";
import type { Logger } from "./logger.ts";
import {
  createHttpApi,
  type HttpServerHandle,
  startHttpServer,
} from "./server/http-api.ts";
import { BridgeTcpServer } from "./server/tcp-server.ts";

export interface RunningBridge {
  backend: Backend;
  tcpAddress: AddressInfo;
  httpAddress: AddressInfo;
  stop(): Promise<void>;
}

export interface StartBridgeOptions {
  logger: Logger;
  /** Use this backend instead of creating one from `config.backend`. */
  backend?: Backend;
}

export async function startBridge(
  config: BridgeConfig,
  options: StartBridgeOptions,
): Promise<RunningBridge> {
  const { logger } = options;
  const backend =
    options.backend ?? BackendRegistry.create(config.backend, { logger });
  logger.info("Backend ready", { type: backend.config.type });

  const tcp = new BridgeTcpServer(backend, {
    connection: config.connection,
    host: config.host,
    logger,
    port: config.tcpPort,
  });
  const tcpAddress = await tcp.start();

  let http: HttpServerHandle;
  try {
    http = await startHttpServer(
      createHttpApi(backend, { logger }),
      config.host,
      config.httpPort,
    );
  } catch (error) {
    await tcp.stop();
    throw error;
  }
  logger.info("HTTP API listening", {
    host: http.address.address,
    port: http.address.port,
  });

  return {
    backend,
    httpAddress: http.address,
    async stop() {
      await Promise.all([tcp.stop(), http.close()]);
      await backend.close?.();
      logger.info("Bridge stopped");
    },
    tcpAddress,
  };
}
