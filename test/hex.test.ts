import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  formatAddress,
  formatHexBytes,
  formatHexDump,
  parseHexByteList,
  parseHexData,
  parseNumber,
  toHexString,
} from "../src/utils/hex.ts";

describe("parseNumber", () => {
  it("accepts hex and decimal literals", () => {
    expect(parseNumber("0x3b")).toBe(0x3b);
    expect(parseNumber("0X3B")).toBe(0x3b);
    expect(parseNumber("59")).toBe(59);
    expect(parseNumber("0")).toBe(0);
  });

  it("rejects values above the limit", () => {
    expect(parseNumber("0xffff")).toBe(0xffff);
    expect(parseNumber("0x10000")).toBeUndefined();
    expect(parseNumber("300", 255)).toBeUndefined();
  });

  it("rejects malformed input", () => {
    for (const value of ["", "0x", "-1", "1.5", "abc", "0xzz", " 12"]) {
      expect(parseNumber(value)).toBeUndefined();
    }
  });
});

describe("parseHexData", () => {
  it("decodes pairs of hex digits", () => {
    expect(Array.from(parseHexData("01020304"))).toEqual([1, 2, 3, 4]);
    expect(Array.from(parseHexData("0xABcd"))).toEqual([0xab, 0xcd]);
  });

  it("skips invalid pairs and an odd trailing digit", () => {
    expect(Array.from(parseHexData("01zz03"))).toEqual([1, 3]);
    expect(Array.from(parseHexData("0102f"))).toEqual([1, 2]);
    expect(parseHexData("").length).toBe(0);
  });

  it("inverts toHexString", () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 32 }), (bytes) => {
        expect(parseHexData(toHexString(bytes))).toEqual(bytes);
      }),
    );
  });
});

describe("formatting", () => {
  it("formats addresses as four lowercase digits", () => {
    expect(formatAddress(0x3b)).toBe("0x003b");
    expect(formatAddress(0xf6fb)).toBe("0xf6fb");
  });

  it("formats byte lists with uppercase digits", () => {
    expect(formatHexBytes(Uint8Array.from([1, 12, 255]))).toBe(
      "[0x01, 0x0C, 0xFF]",
    );
    expect(formatHexBytes(new Uint8Array(0))).toBe("[]");
  });

  it("formats hex dumps", () => {
    expect(formatHexDump(Uint8Array.from([0x0a, 0x00, 0x0e]))).toBe("0A 00 0E");
  });

  it("encodes contiguous lowercase hex", () => {
    expect(toHexString(Uint8Array.from([1, 0xab]))).toBe("01ab");
  });
});

describe("parseHexByteList", () => {
  it("reads what formatHexBytes writes", () => {
    expect(Array.from(parseHexByteList("[0x01, 0x0C, 0xFF]"))).toEqual([
      1, 12, 255,
    ]);
  });

  it("accepts items without a prefix and skips junk", () => {
    expect(Array.from(parseHexByteList("[1, 0c, zz, 0x123, ]"))).toEqual([
      1, 12,
    ]);
    expect(parseHexByteList("[]").length).toBe(0);
  });
});
