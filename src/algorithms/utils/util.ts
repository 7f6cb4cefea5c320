import { ContractViolationError } from "./errors.ts";

export type Bytes = Uint8Array;
export type Input = string | Uint8Array;

const encoder = new TextEncoder();

export const toBytes = (v: Input): Uint8Array =>
  typeof v === "string" ? encoder.encode(v) : v;

export function assertMultipleOf(
  n: number,
  blockSize: number,
  label = "data"
): void {
  if (n % blockSize !== 0)
    throw new ContractViolationError(
      `${label} length must be a multiple of ${blockSize} bytes, got ${n}`
    );
}

export function assertRange(
  buf: Bytes,
  offset: number,
  length: number,
  label: string
): void {
  if (!Number.isInteger(offset) || offset < 0 || offset + length > buf.length)
    throw new ContractViolationError(
      `${label} needs ${length} bytes at offset ${offset}, buffer has ${buf.length}`
    );
}

// Byte lanes of a 32-bit word, least significant first
export const b0 = (x: number): number => x & 0xff;
export const b1 = (x: number): number => (x >>> 8) & 0xff;
export const b2 = (x: number): number => (x >>> 16) & 0xff;
export const b3 = (x: number): number => x >>> 24;

export const rotl32 = (x: number, n: number): number =>
  ((x << n) | (x >>> (32 - n))) >>> 0;
export const rotr32 = (x: number, n: number): number =>
  ((x >>> n) | (x << (32 - n))) >>> 0;

export function readU32LE(buf: Bytes, off: number): number {
  return (
    (buf[off] | (buf[off + 1] << 8) | (buf[off + 2] << 16) | (buf[off + 3] << 24)) >>>
    0
  );
}

export function readU32BE(buf: Bytes, off: number): number {
  return (
    ((buf[off] << 24) | (buf[off + 1] << 16) | (buf[off + 2] << 8) | buf[off + 3]) >>>
    0
  );
}

export function writeU32BE(buf: Bytes, off: number, x: number): void {
  buf[off] = x >>> 24;
  buf[off + 1] = x >>> 16;
  buf[off + 2] = x >>> 8;
  buf[off + 3] = x;
}

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export const hex = {
  toBytes(hex: string): Uint8Array {
    if (!HEX_RE.test(hex))
      throw new ContractViolationError("hex must be an even-length string of hex digits");
    const out = new Uint8Array(hex.length / 2);
    for (let i = 0; i < out.length; i++) {
      out[i] = parseInt(hex.slice(2 * i, 2 * i + 2), 16);
    }
    return out;
  },
  fromBytes(bytes: Bytes): string {
    let s = "";
    for (let i = 0; i < bytes.length; i++)
      s += bytes[i].toString(16).padStart(2, "0");
    return s;
  },
};

/**
 * Turns a key given as bytes, hex or base64 into bytes. Strings are tried as
 * hex first; a string that is neither is rejected rather than UTF-8 encoded.
 */
export function normalizeKey(key: Input): Uint8Array {
  if (typeof key !== "string") return key;

  const s = key.trim();
  if (HEX_RE.test(s)) return hex.toBytes(s);
  if (s.length % 4 === 0 && BASE64_RE.test(s))
    return new Uint8Array(Buffer.from(s, "base64"));
  throw new ContractViolationError("key string must be hex or base64");
}
