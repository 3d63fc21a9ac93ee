/**
 * HTTP convenience API over the shared backend.
 *
 *   GET /                      -> "ok"
 *   GET /read?addr=&len=       -> { addr, len, data }
 *   GET /write?addr=&data=     -> { status, addr, data_written, length }
 *
 * Backend failures answer 200 with an `{ error }` body, which is what the
 * HTTP-bridge backend and browser clients expect.
 */

import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import cors from "cors";
import express, { type Express } from "express";
import { z } from "zod";
import type { Backend } from "../backend/backend.ts";
import { BridgeError, toError } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import {
  formatAddress,
  formatHexBytes,
  parseHexData,
  parseNumber,
} from "../utils/hex.ts";

// Repeated or nested parameters count as missing.
const param = z.string().optional().catch(undefined);

const readQuery = z.object({ addr: param, len: param });
const writeQuery = z.object({ addr: param, data: param });

/** Parse a 16-bit number parameter; missing or invalid values become 0. */
export function parseNumberParam(value: string | undefined): number {
  return value === undefined ? 0 : (parseNumber(value) ?? 0);
}

export interface HttpApiOptions {
  logger?: Logger;
}

export function createHttpApi(
  backend: Backend,
  options: HttpApiOptions = {},
): Express {
  const logger = (options.logger ?? silentLogger).child({
    component: "http",
  });
  const app = express();

  app.use(
    cors({
      allowedHeaders: ["Content-Type"],
      methods: ["GET", "POST", "OPTIONS"],
      origin: "*",
    }),
  );

  app.get("/", (_req, res) => {
    res.type("text/plain").send("ok");
  });

  app.get("/read", async (req, res) => {
    const query = readQuery.parse(req.query);
    const addr = parseNumberParam(query.addr);
    const len = parseNumberParam(query.len);
    logger.info("HTTP read", { addr: formatAddress(addr), len });

    try {
      const data = await backend.read(addr, len);
      res.json({
        addr: formatAddress(addr),
        data: formatHexBytes(data),
        len,
      });
    } catch (error) {
      const message = toError(error).message;
      logger.warn("HTTP read failed", { error: message });
      res.json({ error: `Failed to read from bus: ${message}` });
    }
  });

  app.get("/write", async (req, res) => {
    const query = writeQuery.parse(req.query);
    const addr = parseNumberParam(query.addr);
    const data = parseHexData(query.data ?? "");
    logger.info("HTTP write", {
      addr: formatAddress(addr),
      length: data.length,
    });

    try {
      await backend.write(addr, data);
      res.json({
        addr: formatAddress(addr),
        data_written: formatHexBytes(data),
        length: data.length,
        status: "ok",
      });
    } catch (error) {
      const message = toError(error).message;
      logger.warn("HTTP write failed", { error: message });
      res.json({ error: `Failed to write to bus: ${message}` });
    }
  });

  return app;
}

/** A listening HTTP server bound to an express app. */
export interface HttpServerHandle {
  address: AddressInfo;
  close(): Promise<void>;
}

/** Listen on `host:port` (0 picks a free port). */
export async function startHttpServer(
  app: Express,
  host: string,
  port: number,
): Promise<HttpServerHandle> {
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      listening.off("error", reject);
      resolve(listening);
    });
    listening.once("error", reject);
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new BridgeError("HTTP server has no network address");
  }

  return {
    address,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}
