import request from "supertest";
import { describe, expect, it } from "vitest";
import { MockBackend } from "../src/backend/mock-backend.ts";
import {
  createHttpApi,
  parseNumberParam,
  startHttpServer,
} from "../src/server/http-api.ts";

function setup(backend = new MockBackend()) {
  return { app: createHttpApi(backend), backend };
}

describe("parseNumberParam", () => {
  it("parses hex and decimal, defaulting to zero", () => {
    expect(parseNumberParam("0x003b")).toBe(0x3b);
    expect(parseNumberParam("16")).toBe(16);
    expect(parseNumberParam(undefined)).toBe(0);
    expect(parseNumberParam("zz")).toBe(0);
    expect(parseNumberParam("0x10000")).toBe(0);
  });
});

describe("HTTP API", () => {
  it("answers a liveness probe", async () => {
    const { app } = setup();
    const response = await request(app).get("/");
    expect(response.status).toBe(200);
    expect(response.text).toBe("ok");
    expect(response.headers["access-control-allow-origin"]).toBe("*");
  });

  it("answers CORS preflight requests", async () => {
    const { app } = setup();
    const response = await request(app)
      .options("/read")
      .set("Origin", "http://dashboard.test")
      .set("Access-Control-Request-Method", "GET");
    expect(response.status).toBe(204);
    expect(response.headers["access-control-allow-methods"]).toBe(
      "GET,POST,OPTIONS",
    );
    expect(response.headers["access-control-allow-headers"]).toBe(
      "Content-Type",
    );
  });

  describe("GET /read", () => {
    it("returns the bytes as a hex list", async () => {
      const { app, backend } = setup();
      const response = await request(app).get("/read?addr=0x003b&len=4");
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        addr: "0x003b",
        data: "[0x0C, 0x0C, 0x0C, 0x0C]",
        len: 4,
      });
      expect(backend.reads).toEqual([{ address: 0x3b, length: 4 }]);
    });

    it("treats missing or invalid parameters as zero", async () => {
      const { app } = setup();
      const response = await request(app).get("/read?addr=bogus");
      expect(response.body).toEqual({ addr: "0x0000", data: "[]", len: 0 });
    });

    it("treats repeated parameters as missing", async () => {
      const { app, backend } = setup();
      await request(app).get("/read?addr=1&addr=2&len=1");
      expect(backend.reads).toEqual([{ address: 0, length: 1 }]);
    });

    it("reports backend failures in the body", async () => {
      const { app } = setup(new MockBackend(undefined, { shouldFailRead: true }));
      const response = await request(app).get("/read?addr=0x0043&len=4");
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        error: "Failed to read from bus: Mock backend failure",
      });
    });
  });

  describe("GET /write", () => {
    it("writes decoded hex data", async () => {
      const { app, backend } = setup();
      const response = await request(app).get("/write?addr=0x0043&data=0a0b");
      expect(response.body).toEqual({
        addr: "0x0043",
        data_written: "[0x0A, 0x0B]",
        length: 2,
        status: "ok",
      });
      expect(backend.getLastWrite()).toEqual({
        address: 0x43,
        data: Uint8Array.from([0x0a, 0x0b]),
      });
    });

    it("accepts a 0x prefix and an empty payload", async () => {
      const { app, backend } = setup();
      await request(app).get("/write?addr=16&data=0xFF");
      const empty = await request(app).get("/write?addr=16");
      expect(empty.body).toMatchObject({ data_written: "[]", length: 0 });
      expect(backend.writes.map((write) => Array.from(write.data))).toEqual([
        [0xff],
        [],
      ]);
    });

    it("reports backend failures in the body", async () => {
      const { app } = setup(
        new MockBackend(undefined, {
          errorMessage: "bus stuck",
          shouldFailWrite: true,
        }),
      );
      const response = await request(app).get("/write?addr=1&data=00");
      expect(response.body).toEqual({
        error: "Failed to write to bus: bus stuck",
      });
    });
  });
});

describe("startHttpServer", () => {
  it("listens on an ephemeral port and closes", async () => {
    const { app } = setup();
    const handle = await startHttpServer(app, "127.0.0.1", 0);
    expect(handle.address.port).toBeGreaterThan(0);

    const response = await fetch(
      `http://127.0.0.1:${handle.address.port}/read?addr=1&len=2`,
    );
    expect(await response.json()).toEqual({
      addr: "0x0001",
      data: "[0x0C, 0x0C]",
      len: 2,
    });
    await handle.close();
  });

  it("rejects when the port is taken", async () => {
    const { app } = setup();
    const first = await startHttpServer(app, "127.0.0.1", 0);
    await expect(
      startHttpServer(app, "127.0.0.1", first.address.port),
    ).rejects.toThrow(/EADDRINUSE/);
    await first.close();
  });
});
