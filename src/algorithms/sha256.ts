/*
 * SHA-256 in two flavours plus a one-shot helper.
 *
 * - RawSha256 takes data in whole 64-byte blocks only; finish() pads whatever
 *   is left and produces the digest.
 * - BufferedSha256 wraps a RawSha256 with a one-block buffer so update() takes
 *   any length.
 * - hash() is RawSha256.finish() on a fresh state, which already copes with
 *   input of any length.
 *
 * Both hashers are single-use: after finish() every further call throws.
 * Words are handled as 32-bit integers; big-endian on the wire.
 */

import { inspect } from "node:util";
import { SHA256_IV, SHA256_K } from "./utils/constants.ts";
import {
  ContractViolationError,
  HashLimitExceededError,
} from "./utils/errors.ts";
import {
  type Input,
  assertMultipleOf,
  readU32BE,
  toBytes,
  writeU32BE,
} from "./utils/util.ts";

/** Digest length in bytes */
export const HASH_BYTES = 32;
/** Compression function input size in bytes */
export const SHA256_BLOCK_BYTES = 64;
/** Accumulators must stay below this many bytes so the bit length fits 64 bits */
export const MAX_HASH_BYTES = 2n ** 61n;

const EMPTY = new Uint8Array(0);

// Message schedule and padding scratch, shared by every hasher
const W = new Uint32Array(64);
const PAD = new Uint8Array(SHA256_BLOCK_BYTES * 2);

/**
 * Runs the compression function over data[off..end), which must be a whole
 * number of blocks, folding the result into `state`.
 */
function compress(state: Uint32Array, data: Uint8Array, off: number, end: number): void {
  for (; off < end; off += SHA256_BLOCK_BYTES) {
    for (let i = 0; i < 16; i++) W[i] = readU32BE(data, off + 4 * i);
    for (let i = 16; i < 64; i++) {
      const w15 = W[i - 15];
      const w2 = W[i - 2];
      const s0 = ((w15 >>> 7) | (w15 << 25)) ^ ((w15 >>> 18) | (w15 << 14)) ^ (w15 >>> 3);
      const s1 = ((w2 >>> 17) | (w2 << 15)) ^ ((w2 >>> 19) | (w2 << 13)) ^ (w2 >>> 10);
      W[i] = W[i - 16] + s0 + W[i - 7] + s1;
    }

    let a = state[0];
    let b = state[1];
    let c = state[2];
    let d = state[3];
    let e = state[4];
    let f = state[5];
    let g = state[6];
    let h = state[7];

    for (let i = 0; i < 64; i++) {
      const S1 = ((e >>> 6) | (e << 26)) ^ ((e >>> 11) | (e << 21)) ^ ((e >>> 25) | (e << 7));
      const ch = (e & f) ^ (~e & g);
      const t1 = (h + S1 + ch + SHA256_K[i] + W[i]) | 0;
      const S0 = ((a >>> 2) | (a << 30)) ^ ((a >>> 13) | (a << 19)) ^ ((a >>> 22) | (a << 10));
      const maj = (a & b) ^ (a & c) ^ (b & c);
      const t2 = (S0 + maj) | 0;

      h = g;
      g = f;
      f = e;
      e = (d + t1) | 0;
      d = c;
      c = b;
      b = a;
      a = (t1 + t2) | 0;
    }

    state[0] += a;
    state[1] += b;
    state[2] += c;
    state[3] += d;
    state[4] += e;
    state[5] += f;
    state[6] += g;
    state[7] += h;
  }
}

function checkedTotal(count: bigint, more: number): bigint {
  const total = count + BigInt(more);
  if (total >= MAX_HASH_BYTES) throw new HashLimitExceededError(total);
  return total;
}

/**
 * SHA-256 state without a buffer: update() only accepts multiples of 64 bytes.
 *
 * @example
 * ```ts
 * const digest = new RawSha256().update(firstBlocks).finish(rest);
 * ```
 */
export class RawSha256 {
  protected readonly h = new Uint32Array(SHA256_IV);
  protected byteCount = 0n;
  private consumed = false;

  /** Bytes absorbed so far. */
  get bytesHashed(): bigint {
    return this.byteCount;
  }

  /**
   * Processes one or more whole blocks. Throws `ContractViolationError` when
   * the length is not a multiple of 64 and `HashLimitExceededError` (leaving the
   * state as it was) when the running total would reach 2^61 bytes.
   */
  update(input: Input): this {
    this.assertLive("update");
    const data = toBytes(input);
    assertMultipleOf(data.length, SHA256_BLOCK_BYTES, "RawSha256 input");
    if (data.length === 0) return this;

    const total = checkedTotal(this.byteCount, data.length);
    compress(this.h, data, 0, data.length);
    this.byteCount = total;
    return this;
  }

  /**
   * Absorbs `input` (any length), pads, and returns the 32-byte digest. The
   * state is consumed.
   */
  finish(input: Input = EMPTY): Uint8Array {
    this.assertLive("finish");
    const data = toBytes(input);
    const total = checkedTotal(this.byteCount, data.length);

    const extra = data.length % SHA256_BLOCK_BYTES;
    const whole = data.length - extra;
    compress(this.h, data, 0, whole);

    // 0x80 marker, zeros, then the 64-bit bit length; a second block is needed
    // when fewer than 9 bytes of room are left after the tail.
    PAD.fill(0);
    PAD.set(data.subarray(whole), 0);
    PAD[extra] = 0x80;
    const end = extra > SHA256_BLOCK_BYTES - 9 ? SHA256_BLOCK_BYTES * 2 : SHA256_BLOCK_BYTES;
    const bits = total << 3n;
    writeU32BE(PAD, end - 8, Number(bits >> 32n));
    writeU32BE(PAD, end - 4, Number(bits & 0xffffffffn));
    compress(this.h, PAD, 0, end);

    this.byteCount = total;
    this.consumed = true;

    const digest = new Uint8Array(HASH_BYTES);
    for (let i = 0; i < 8; i++) writeU32BE(digest, 4 * i, this.h[i]);
    return digest;
  }

  /** Independent copy of a live state. */
  clone(): RawSha256 {
    this.assertLive("clone");
    const copy = new RawSha256();
    copy.h.set(this.h);
    copy.byteCount = this.byteCount;
    return copy;
  }

  [inspect.custom](): string {
    return "RawSha256 { ... }";
  }

  private assertLive(op: string): void {
    if (this.consumed)
      throw new ContractViolationError(`RawSha256.${op}() called after finish()`);
  }
}

/**
 * SHA-256 state that accepts input of any length.
 *
 * @example
 * ```ts
 * const hasher = new BufferedSha256();
 * hasher.update("Here is a piece of text ");
 * hasher.update(moreBytes);
 * const digest = hasher.finish();
 * ```
 */
export class BufferedSha256 {
  private readonly inner: RawSha256;
  private readonly buf = new Uint8Array(SHA256_BLOCK_BYTES);
  private buffered = 0;
  private consumed = false;

  /**
   * @param inner Raw state to continue from. The wrapper works on a copy, so
   * `inner` stays usable on its own.
   */
  constructor(inner: RawSha256 = new RawSha256()) {
    this.inner = inner.clone();
  }

  /** Bytes absorbed so far, including those still buffered. */
  get bytesHashed(): bigint {
    return this.inner.bytesHashed + BigInt(this.buffered);
  }

  update(input: Input): this {
    this.assertLive("update");
    let data = toBytes(input);
    checkedTotal(this.bytesHashed, data.length);

    if (this.buffered > 0) {
      const room = SHA256_BLOCK_BYTES - this.buffered;
      if (data.length < room) {
        this.buf.set(data, this.buffered);
        this.buffered += data.length;
        return this;
      }
      this.buf.set(data.subarray(0, room), this.buffered);
      this.inner.update(this.buf);
      this.buffered = 0;
      data = data.subarray(room);
    }

    const tail = data.length % SHA256_BLOCK_BYTES;
    if (data.length > tail) this.inner.update(data.subarray(0, data.length - tail));
    this.buf.set(data.subarray(data.length - tail), 0);
    this.buffered = tail;
    return this;
  }

  /** Absorbs `input`, then returns the digest. The state is consumed. */
  finish(input: Input = EMPTY): Uint8Array {
    this.assertLive("finish");
    const data = toBytes(input);
    if (data.length > 0) this.update(data);

    const digest = this.inner.finish(this.buf.subarray(0, this.buffered));
    this.consumed = true;
    return digest;
  }

  clone(): BufferedSha256 {
    this.assertLive("clone");
    const copy = new BufferedSha256(this.inner);
    copy.buf.set(this.buf);
    copy.buffered = this.buffered;
    return copy;
  }

  [inspect.custom](): string {
    return "BufferedSha256 { ... }";
  }

  private assertLive(op: string): void {
    if (this.consumed)
      throw new ContractViolationError(`BufferedSha256.${op}() called after finish()`);
  }
}

/** SHA-256 of a message already held in memory. Strings are hashed as UTF-8. */
export function hash(data: Input): Uint8Array {
  return new RawSha256().finish(data);
}
