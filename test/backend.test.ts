import { afterEach, describe, expect, it } from "vitest";
import {
  type Backend,
  BackendRegistry,
  HttpBridgeBackend,
  MockBackend,
  RegisterBusBackend,
  validateAccess,
} from "../src/backend/index.ts";
import { BackendError } from "../src/errors.ts";
import { silentLogger } from "../src/logger.ts";

const context = { logger: silentLogger };

describe("validateAccess", () => {
  it("accepts the full 16-bit address range", () => {
    expect(() => validateAccess(0, 0)).not.toThrow();
    expect(() => validateAccess(0xffff, 4)).not.toThrow();
  });

  it("rejects addresses outside 0..0xFFFF", () => {
    expect(() => validateAccess(-1, 1)).toThrow(
      "Register address out of range: -1",
    );
    expect(() => validateAccess(0x10000, 1)).toThrow(
      "Register address out of range: 65536",
    );
    expect(() => validateAccess(1.5, 1)).toThrow(BackendError);
  });

  it("rejects negative or fractional lengths", () => {
    expect(() => validateAccess(0, -1)).toThrow("Invalid transfer length: -1");
    expect(() => validateAccess(0, 0.5)).toThrow(BackendError);
  });
});

describe("BackendRegistry", () => {
  afterEach(() => {
    BackendRegistry.register(
      "mock",
      (config, { logger }) => new MockBackend(config, { logger }),
    );
  });

  it("has a factory for every backend type", () => {
    expect(BackendRegistry.getRegisteredTypes().sort()).toEqual([
      "bus",
      "http",
      "mock",
    ]);
  });

  it("creates each backend from its config", () => {
    expect(
      BackendRegistry.create({ fillValue: 7, type: "mock" }, context),
    ).toBeInstanceOf(MockBackend);
    expect(
      BackendRegistry.create(
        { baseUrl: "http://bridge.test", type: "http" },
        context,
      ),
    ).toBeInstanceOf(HttpBridgeBackend);
    // Opening the bus is deferred, so no device is touched here.
    expect(
      BackendRegistry.create(
        { busNumber: 1, deviceAddress: 0x3b, type: "bus" },
        context,
      ),
    ).toBeInstanceOf(RegisterBusBackend);
  });

  it("passes the config through to the backend", async () => {
    const backend = BackendRegistry.create({ fillValue: 7, type: "mock" }, context);
    expect(backend.config).toEqual({ fillValue: 7, type: "mock" });
    expect(Array.from(await backend.read(0x10, 3))).toEqual([7, 7, 7]);
  });

  it("lets a later registration replace a factory", () => {
    const replacement: Backend = {
      config: { type: "mock" },
      read: async () => new Uint8Array(0),
      write: async () => {},
    };
    BackendRegistry.register("mock", () => replacement);
    expect(BackendRegistry.create({ type: "mock" }, context)).toBe(replacement);
  });
});

describe("MockBackend", () => {
  it("fills reads with the default byte", async () => {
    const backend = new MockBackend();
    expect(Array.from(await backend.read(0x0043, 4))).toEqual([12, 12, 12, 12]);
    expect(backend.fillValue).toBe(12);
    expect(backend.reads).toEqual([{ address: 0x0043, length: 4 }]);
  });

  it("returns an empty array for a zero-length read", async () => {
    const backend = new MockBackend();
    expect((await backend.read(0, 0)).length).toBe(0);
  });

  it("records writes as copies", async () => {
    const backend = new MockBackend();
    const data = Uint8Array.from([0x00, 0x08]);
    await backend.write(0xf020, data);
    data[0] = 0xff;
    expect(backend.getLastWrite()).toEqual({
      address: 0xf020,
      data: Uint8Array.from([0x00, 0x08]),
    });
  });

  it("simulates failures on demand", async () => {
    const backend = new MockBackend(undefined, { errorMessage: "bus stuck" });
    backend.setFailures({ read: true });
    await expect(backend.read(0, 1)).rejects.toThrow("bus stuck");
    await expect(backend.write(0, Uint8Array.of(1))).resolves.toBeUndefined();

    backend.setFailures({ read: false, write: true });
    await expect(backend.read(0, 1)).resolves.toEqual(Uint8Array.of(12));
    await expect(backend.write(0, Uint8Array.of(1))).rejects.toBeInstanceOf(
      BackendError,
    );
    expect(backend.writes).toHaveLength(1);
  });

  it("validates before recording anything", async () => {
    const backend = new MockBackend();
    await expect(backend.read(0x10000, 1)).rejects.toBeInstanceOf(BackendError);
    expect(backend.reads).toHaveLength(0);
  });
});
