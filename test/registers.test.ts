import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  decodeRegister,
  defaultRegisterMap,
  encodeRegister,
  findRegister,
  loadRegisterMap,
  parseRegisterMap,
  type RegisterDefinition,
} from "../src/dsp/registers.ts";
import { ConfigError } from "../src/errors.ts";
import { hex } from "./byte-pipe.ts";

const gain: RegisterDefinition = {
  address: 67,
  format: "Int8_24",
  max: 0,
  min: -80,
  name: "Gain",
  readOnly: false,
  unit: "decibel",
};

describe("default register map", () => {
  it("lists the stock program registers", () => {
    const map = defaultRegisterMap();
    expect(map.map((register) => register.address)).toEqual([61, 67, 79, 41, 65]);
    expect(findRegister(map, 67)).toEqual(gain);
    expect(map.filter((register) => register.readOnly)).toHaveLength(4);
  });

  it("finds nothing at unknown addresses", () => {
    expect(findRegister(defaultRegisterMap(), 0x1234)).toBeUndefined();
  });
});

describe("parseRegisterMap", () => {
  it("rejects inverted bounds", () => {
    expect(() => parseRegisterMap([{ ...gain, max: -90 }])).toThrow(
      "Invalid register map: 0: min must not exceed max",
    );
  });

  it("rejects unknown formats and units", () => {
    try {
      parseRegisterMap([{ ...gain, format: "Float32", unit: "volt" }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^0\.format: /);
        expect(error.issues[1]).toMatch(/^0\.unit: /);
      }
    }
  });

  it("rejects addresses beyond 16 bits", () => {
    expect(() => parseRegisterMap([{ ...gain, address: 0x10000 }])).toThrow(
      ConfigError,
    );
  });
});

describe("loadRegisterMap", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { force: true, recursive: true });
    dir = undefined;
  });

  it("reads a map from disk", () => {
    dir = mkdtempSync(join(tmpdir(), "registers-"));
    const path = join(dir, "map.json");
    writeFileSync(path, JSON.stringify([gain]));
    expect(loadRegisterMap(path)).toEqual([gain]);
  });

  it("reports files that cannot be parsed", () => {
    dir = mkdtempSync(join(tmpdir(), "registers-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{");
    expect(() => loadRegisterMap(path)).toThrow(ConfigError);
    expect(() => loadRegisterMap(path)).toThrow(
      `Cannot read register map ${path}: `,
    );
  });
});

describe("register encoding", () => {
  it("encodes decibel values through the linear scale", () => {
    expect(Array.from(encodeRegister(gain, 0))).toEqual(hex("01 00 00 00"));
    expect(Array.from(encodeRegister(gain, -20))).toEqual(hex("00 19 99 99"));
  });

  it("decodes level meters with the power scale", () => {
    expect(decodeRegister(gain, Uint8Array.from(hex("0A 00 00 00")))).toBe(10);
    expect(decodeRegister(gain, encodeRegister(gain, -20))).toBeCloseTo(-10, 4);
  });

  it("leaves unitless integers unchanged", () => {
    const meter: RegisterDefinition = {
      ...gain,
      format: "Int32_0",
      max: 268435456,
      min: 0,
      unit: "none",
    };
    expect(Array.from(encodeRegister(meter, 268435456))).toEqual(
      hex("10 00 00 00"),
    );
    expect(decodeRegister(meter, Uint8Array.from(hex("00 00 03 E8")))).toBe(1000);
  });
});
