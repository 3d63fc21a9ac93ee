/**
 * Backend that forwards register access to another bridge's HTTP API
 * (`GET /read` and `GET /write`).
 */

import { z } from "zod";
import { BackendError, toError } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import {
  formatAddress,
  parseHexByteList,
  toHexString,
} from "../utils/hex.ts";
import {
  type Backend,
  type HttpBackendConfig,
  validateAccess,
} from "./backend.ts";

const errorAnswer = z.object({ error: z.string() });

const readAnswer = z.object({
  addr: z.string(),
  data: z.string(),
  len: z.number().int().nonnegative(),
});

const writeAnswer = z.object({
  status: z.literal("ok"),
});

export interface HttpBridgeBackendOptions {
  /** Replaces the global `fetch` (tests). */
  fetch?: typeof fetch;
  logger?: Logger;
}

export class HttpBridgeBackend implements Backend {
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;
  private readonly baseUrl: string;

  constructor(
    public readonly config: HttpBackendConfig,
    options: HttpBridgeBackendOptions = {},
  ) {
    this.fetchFn = options.fetch ?? fetch;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.logger = (options.logger ?? silentLogger).child({
      backend: "http",
      baseUrl: this.baseUrl,
    });
  }

  /** URL of a read request, e.g. `{base}/read?addr=0x003b&len=4`. */
  readUrl(address: number, length: number): string {
    return `${this.baseUrl}/read?addr=${formatAddress(address)}&len=${length}`;
  }

  /** URL of a write request, e.g. `{base}/write?addr=0x003b&data=01020304`. */
  writeUrl(address: number, data: Uint8Array): string {
    return `${this.baseUrl}/write?addr=${formatAddress(address)}&data=${toHexString(data)}`;
  }

  async read(address: number, length: number): Promise<Uint8Array> {
    validateAccess(address, length);
    const body = await this.request(this.readUrl(address, length));
    const parsed = readAnswer.safeParse(body);
    if (!parsed.success) {
      throw new BackendError("Unexpected read answer from HTTP bridge");
    }
    const data = parseHexByteList(parsed.data.data);
    if (data.length !== length) {
      throw new BackendError(
        `HTTP bridge returned ${data.length} bytes, expected ${length}`,
      );
    }
    return data;
  }

  async write(address: number, data: Uint8Array): Promise<void> {
    validateAccess(address, data.length);
    const body = await this.request(this.writeUrl(address, data));
    if (!writeAnswer.safeParse(body).success) {
      throw new BackendError("Unexpected write answer from HTTP bridge");
    }
  }

  /** Issue a GET and return the decoded JSON body, mapping failures. */
  private async request(url: string): Promise<unknown> {
    this.logger.debug("HTTP bridge request", { url });
    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (error) {
      throw new BackendError(
        `HTTP bridge request failed: ${toError(error).message}`,
        { cause: error },
      );
    }
    if (!response.ok) {
      throw new BackendError(
        `HTTP bridge answered ${response.status} ${response.statusText}`.trim(),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new BackendError("HTTP bridge answered with invalid JSON", {
        cause: error,
      });
    }
    const failure = errorAnswer.safeParse(body);
    if (failure.success) {
      throw new BackendError(failure.data.error);
    }
    return body;
  }
}
