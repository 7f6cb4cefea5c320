import { describe, test } from "vitest";
import { ContractViolationError } from "../../../src/algorithms/utils/errors.ts";
import {
  assertMultipleOf,
  assertRange,
  hex,
  normalizeKey,
  readU32BE,
  readU32LE,
  rotl32,
  rotr32,
  toBytes,
  writeU32BE,
} from "../../../src/algorithms/utils/util.ts";

describe("hex", () => {
  test("encodes bytes as lowercase pairs", ({ expect }) => {
    expect(hex.fromBytes(new Uint8Array([0x00, 0x0f, 0xa0, 0xff]))).toBe("000fa0ff");
    expect(hex.fromBytes(new Uint8Array(0))).toBe("");
  });

  test("decodes either case", ({ expect }) => {
    expect(Array.from(hex.toBytes("00FfA0"))).toStrictEqual([0x00, 0xff, 0xa0]);
  });

  test("rejects odd lengths and non-hex digits", ({ expect }) => {
    expect(() => hex.toBytes("abc")).toThrow(ContractViolationError);
    expect(() => hex.toBytes("zz")).toThrow(
      "hex must be an even-length string of hex digits",
    );
  });
});

describe("toBytes", () => {
  test("encodes strings as UTF-8", ({ expect }) => {
    expect(Array.from(toBytes("aé"))).toStrictEqual([0x61, 0xc3, 0xa9]);
  });

  test("passes bytes through", ({ expect }) => {
    const bytes = new Uint8Array([1, 2, 3]);

    expect(toBytes(bytes)).toBe(bytes);
  });
});

describe("normalizeKey", () => {
  test("decodes hex", ({ expect }) => {
    expect(hex.fromBytes(normalizeKey(" 000102030405060708090a0b0c0d0e0f\n"))).toBe(
      "000102030405060708090a0b0c0d0e0f",
    );
  });

  test("decodes base64", ({ expect }) => {
    expect(hex.fromBytes(normalizeKey("AAECAwQFBgcICQoLDA0ODw=="))).toBe(
      "000102030405060708090a0b0c0d0e0f",
    );
  });

  test("keeps byte keys as they are", ({ expect }) => {
    const key = new Uint8Array(16);

    expect(normalizeKey(key)).toBe(key);
  });

  test("rejects anything else", ({ expect }) => {
    expect(() => normalizeKey("test-secret")).toThrow("key string must be hex or base64");
  });
});

describe("assertions", () => {
  test("assertMultipleOf", ({ expect }) => {
    expect(() => assertMultipleOf(128, 64)).not.toThrow();
    expect(() => assertMultipleOf(0, 64)).not.toThrow();
    expect(() => assertMultipleOf(65, 64)).toThrow(
      "data length must be a multiple of 64 bytes, got 65",
    );
  });

  test("assertRange", ({ expect }) => {
    const buf = new Uint8Array(16);

    expect(() => assertRange(buf, 0, 16, "block")).not.toThrow();
    expect(() => assertRange(buf, 1, 16, "block")).toThrow(
      "block needs 16 bytes at offset 1, buffer has 16",
    );
    expect(() => assertRange(buf, 0.5, 4, "block")).toThrow(ContractViolationError);
  });
});

describe("words", () => {
  test("rotations stay unsigned", ({ expect }) => {
    expect(rotl32(0x80000001, 1)).toBe(0x00000003);
    expect(rotl32(0x12345678, 8)).toBe(0x34567812);
    expect(rotr32(0x00000003, 1)).toBe(0x80000001);
    expect(rotr32(0x12345678, 8)).toBe(0x78123456);
  });

  test("reads both byte orders", ({ expect }) => {
    const buf = new Uint8Array([0xff, 0x01, 0x02, 0x03, 0x84]);

    expect(readU32LE(buf, 1)).toBe(0x84030201);
    expect(readU32BE(buf, 1)).toBe(0x01020384);
    expect(readU32BE(buf, 0)).toBe(0xff010203);
  });

  test("writes big-endian", ({ expect }) => {
    const buf = new Uint8Array(6);
    writeU32BE(buf, 1, 0xdeadbeef);

    expect(hex.fromBytes(buf)).toBe("00deadbeef00");
  });
});
