import { test } from "vitest";
import {
  ContractViolationError,
  Twofish,
  UnsupportedKeySizeError,
  createTwofish,
  hex,
  sha256,
  sha256Hex,
} from "../src/wrappers.ts";

test("sha256Hex", ({ expect }) => {
  expect(sha256Hex("abc")).toBe(
    "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
  );
  expect(hex.fromBytes(sha256(new Uint8Array(0)))).toBe(
    "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
  );
});

test("createTwofish takes hex, base64 or bytes", ({ expect }) => {
  const expected = new Twofish(hex.toBytes("000102030405060708090a0b0c0d0e0f0001020304050607"))
    .encrypt(new Uint8Array(16));
  const base64 = createTwofish("AAECAwQFBgcICQoLDA0ODwABAgMEBQYH");
  const hexKey = createTwofish("000102030405060708090A0B0C0D0E0F0001020304050607");

  expect(base64.keySize).toBe(192);
  expect(base64.encrypt(new Uint8Array(16))).toStrictEqual(expected);
  expect(hexKey.encrypt(new Uint8Array(16))).toStrictEqual(expected);
  expect(hex.fromBytes(createTwofish(new Uint8Array(16)).encrypt(new Uint8Array(16)))).toBe(
    "9f589f5cf6122c32b6bfec2f2ae8c35a",
  );
});

test("createTwofish rejects bad keys", ({ expect }) => {
  expect(() => createTwofish("not a key")).toThrow(ContractViolationError);
  expect(() => createTwofish("00112233")).toThrow(UnsupportedKeySizeError);
});
