/*
 * Twofish block cipher: key schedule plus single-block encrypt/decrypt.
 *
 * Overview
 * --------
 * - The key schedule derives 40 subkeys (8 whitening + 32 round subkeys) and four
 *   key-dependent 256-entry tables that fold the q-box cascade and the MDS
 *   multiply into one lookup per byte.
 * - Data is processed in 128-bit blocks (16 bytes); words are little-endian.
 * - Only the primitive is provided. Chaining and padding are up to the caller.
 *
 * Session layout (one ArrayBuffer, 4256 bytes)
 * --------------------------------------------
 * [0    .. 4096) : s0..s3 (4 × 256 u32) key-dependent S-boxes composed with MDS.
 * [4096 .. 4256) : subKeys (40 u32); 0..7 whitening, 8..39 round subkeys.
 */

import { inspect } from "node:util";
import type { BlockCipher } from "./utils/block-cipher.ts";
import {
  MDS0,
  MDS1,
  MDS2,
  MDS3,
  Q0,
  Q1,
  RS_ANTILOG,
  RS_LOG,
  RS_MATRIX_LOG,
} from "./utils/constants.ts";
import {
  ContractViolationError,
  UnsupportedKeySizeError,
} from "./utils/errors.ts";
import {
  type Bytes,
  assertRange,
  b0,
  b1,
  b2,
  b3,
  readU32LE,
  rotl32,
  rotr32,
} from "./utils/util.ts";

/** Twofish block length in bytes */
export const TWOFISH_BLOCK_BYTES = 16;

export type KeySize = 128 | 192 | 256;

interface Session {
  readonly keySize: KeySize;
  readonly s0: Uint32Array;
  readonly s1: Uint32Array;
  readonly s2: Uint32Array;
  readonly s3: Uint32Array;
  readonly subKeys: Uint32Array;
}

/** Copy of a session's derived tables, for inspection and comparison. */
export interface TwofishSchedule {
  sBoxes: [Uint32Array, Uint32Array, Uint32Array, Uint32Array];
  whitening: Uint32Array;
  roundKeys: Uint32Array;
}

// Algorithm parameters (fixed for Twofish)
const ROUNDS = 16;
const SK_ROTL = 9; // rotation applied when generating odd subkeys
const ROUND_SUBKEYS = 8; // index where round subkeys start (after 8 whitening keys)
const SUBKEY_CNT = 40;

/**
 * rsEncode
 * --------
 * Multiplies the 8 key bytes at key[off..off+8) by the 4×8 Reed–Solomon matrix
 * over GF(2^8), producing one 32-bit word of the S vector. Products are taken
 * as antilog(log a + log b), so no polynomial reduction is needed.
 */
function rsEncode(key: Bytes, off: number): number {
  let s0 = 0;
  let s1 = 0;
  let s2 = 0;
  let s3 = 0;
  for (let col = 0; col < 8; col++) {
    const m = key[off + col];
    if (m === 0) continue;
    const e = RS_LOG[m];
    s0 ^= RS_ANTILOG[e + RS_MATRIX_LOG[col]];
    s1 ^= RS_ANTILOG[e + RS_MATRIX_LOG[8 + col]];
    s2 ^= RS_ANTILOG[e + RS_MATRIX_LOG[16 + col]];
    s3 ^= RS_ANTILOG[e + RS_MATRIX_LOG[24 + col]];
  }
  return (s0 | (s1 << 8) | (s2 << 16) | (s3 << 24)) >>> 0;
}

// Scratch for qCascade outputs (one byte per MDS column)
const lanes = new Uint8Array(4);

/**
 * qCascade
 * --------
 * The substitution half of Twofish's h(X, L) for X = x‖x‖x‖x: one stage of
 * q-boxes per key word, highest word first, XORing each stage with the bytes of
 * l3 (256-bit keys), l2 (192 and up), l1 and l0. The final q layer is applied
 * too, leaving only the MDS multiply. Results land in lanes[0..3].
 */
function qCascade(
  k64Cnt: number,
  x: number,
  l0: number,
  l1: number,
  l2: number,
  l3: number
): void {
  let y0 = x;
  let y1 = x;
  let y2 = x;
  let y3 = x;

  switch (k64Cnt) {
    case 4:
      y0 = Q1[y0] ^ b0(l3);
      y1 = Q0[y1] ^ b1(l3);
      y2 = Q0[y2] ^ b2(l3);
      y3 = Q1[y3] ^ b3(l3);
    /* falls through */

    case 3:
      y0 = Q1[y0] ^ b0(l2);
      y1 = Q1[y1] ^ b1(l2);
      y2 = Q0[y2] ^ b2(l2);
      y3 = Q0[y3] ^ b3(l2);
    /* falls through */

    default:
      lanes[0] = Q1[Q0[Q0[y0] ^ b0(l1)] ^ b0(l0)];
      lanes[1] = Q0[Q0[Q1[y1] ^ b1(l1)] ^ b1(l0)];
      lanes[2] = Q1[Q1[Q0[y2] ^ b2(l1)] ^ b2(l0)];
      lanes[3] = Q0[Q1[Q1[y3] ^ b3(l1)] ^ b3(l0)];
  }
}

/** h(x‖x‖x‖x, L) as a single word. */
function h(k64Cnt: number, x: number, l0: number, l1: number, l2: number, l3: number): number {
  qCascade(k64Cnt, x, l0, l1, l2, l3);
  return (MDS0[lanes[0]] ^ MDS1[lanes[1]] ^ MDS2[lanes[2]] ^ MDS3[lanes[3]]) >>> 0;
}

function keySizeOf(keyLength: number): KeySize {
  switch (keyLength) {
    case 16:
      return 128;
    case 24:
      return 192;
    case 32:
      return 256;
    default:
      throw new UnsupportedKeySizeError(keyLength);
  }
}

/**
 * makeSession(key)
 * ----------------
 * Builds the key schedule for a 16-, 24- or 32-byte key. The key itself is
 * read once and not kept.
 */
function makeSession(key: Bytes): Session {
  const keyLength = key.length;
  const keySize = keySizeOf(keyLength);
  const k64Cnt = keyLength / 8; // number of 64-bit chunks: 2, 3 or 4

  // Key words: Me = m0, m2, m4, m6 (even), Mo = m1, m3, m5, m7 (odd)
  const m = new Uint32Array(8);
  for (let i = 0; i < keyLength / 4; i++) m[i] = readU32LE(key, 4 * i);

  // S vector, RS-encoded per 64-bit chunk and stored in reverse chunk order
  const sVec = new Uint32Array(4);
  for (let i = 0; i < k64Cnt; i++) sVec[k64Cnt - 1 - i] = rsEncode(key, 8 * i);

  const sessionMemory = new ArrayBuffer(4256);
  const s0 = new Uint32Array(sessionMemory, 0, 256);
  const s1 = new Uint32Array(sessionMemory, 1024, 256);
  const s2 = new Uint32Array(sessionMemory, 2048, 256);
  const s3 = new Uint32Array(sessionMemory, 3072, 256);
  const subKeys = new Uint32Array(sessionMemory, 4096, SUBKEY_CNT);

  // Whitening and round subkeys: K[2i] = A + B, K[2i+1] = (A + 2B) <<< 9
  for (let j = 0; j < SUBKEY_CNT; j += 2) {
    const A = h(k64Cnt, j, m[0], m[2], m[4], m[6]);
    const B = rotl32(h(k64Cnt, j + 1, m[1], m[3], m[5], m[7]), 8);
    subKeys[j] = A + B;
    subKeys[j + 1] = rotl32((A + 2 * B) >>> 0, SK_ROTL);
  }

  // Key-dependent S-boxes with the MDS multiply folded in, one lane per table
  for (let x = 0; x < 256; x++) {
    qCascade(k64Cnt, x, sVec[0], sVec[1], sVec[2], sVec[3]);
    s0[x] = MDS0[lanes[0]];
    s1[x] = MDS1[lanes[1]];
    s2[x] = MDS2[lanes[2]];
    s3[x] = MDS3[lanes[3]];
  }

  m.fill(0);
  sVec.fill(0);

  return { keySize, s0, s1, s2, s3, subKeys };
}

/**
 * outputBlock
 * -----------
 * Writes four 32-bit words to `out` in little-endian order at offset `oo`.
 */
function outputBlock(
  out: Bytes,
  oo: number,
  x0: number,
  x1: number,
  x2: number,
  x3: number
) {
  out[oo++] = x0;
  out[oo++] = x0 >>> 8;
  out[oo++] = x0 >>> 16;
  out[oo++] = x0 >>> 24;
  out[oo++] = x1;
  out[oo++] = x1 >>> 8;
  out[oo++] = x1 >>> 16;
  out[oo++] = x1 >>> 24;
  out[oo++] = x2;
  out[oo++] = x2 >>> 8;
  out[oo++] = x2 >>> 16;
  out[oo++] = x2 >>> 24;
  out[oo++] = x3;
  out[oo++] = x3 >>> 8;
  out[oo++] = x3 >>> 16;
  out[oo] = x3 >>> 24;
}

/**
 * encryptBlock
 * ------------
 * Encrypts the 16 bytes at plain[io..] into cipher[oo..]. Input whitening,
 * 16 Feistel rounds (two per loop pass), output whitening. In-place use is fine.
 */
function encryptBlock(
  plain: Bytes,
  io: number,
  cipher: Bytes,
  oo: number,
  { s0, s1, s2, s3, subKeys: sKey }: Session
): void {
  assertRange(plain, io, TWOFISH_BLOCK_BYTES, "plaintext block");
  assertRange(cipher, oo, TWOFISH_BLOCK_BYTES, "ciphertext block");

  let x0 = readU32LE(plain, io) ^ sKey[0];
  let x1 = readU32LE(plain, io + 4) ^ sKey[1];
  let x2 = readU32LE(plain, io + 8) ^ sKey[2];
  let x3 = readU32LE(plain, io + 12) ^ sKey[3];

  let t0: number;
  let t1: number;
  let k = ROUND_SUBKEYS;

  for (let R = 0; R < ROUNDS; R += 2) {
    // g(x0) and g(x1 <<< 8)
    t0 = s0[x0 & 0xff] ^ s1[(x0 >>> 8) & 0xff] ^ s2[(x0 >>> 16) & 0xff] ^ s3[x0 >>> 24];
    t1 = s0[x1 >>> 24] ^ s1[x1 & 0xff] ^ s2[(x1 >>> 8) & 0xff] ^ s3[(x1 >>> 16) & 0xff];

    x2 = rotr32(x2 ^ (t0 + t1 + sKey[k++]), 1);
    x3 = rotl32(x3, 1) ^ (t0 + 2 * t1 + sKey[k++]);

    t0 = s0[x2 & 0xff] ^ s1[(x2 >>> 8) & 0xff] ^ s2[(x2 >>> 16) & 0xff] ^ s3[x2 >>> 24];
    t1 = s0[x3 >>> 24] ^ s1[x3 & 0xff] ^ s2[(x3 >>> 8) & 0xff] ^ s3[(x3 >>> 16) & 0xff];

    x0 = rotr32(x0 ^ (t0 + t1 + sKey[k++]), 1);
    x1 = rotl32(x1, 1) ^ (t0 + 2 * t1 + sKey[k++]);
  }

  // Undo the last swap while whitening: (x2, x3, x0, x1)
  outputBlock(cipher, oo, x2 ^ sKey[4], x3 ^ sKey[5], x0 ^ sKey[6], x1 ^ sKey[7]);
}

/**
 * decryptBlock
 * ------------
 * Inverse of encryptBlock(): same tables, rounds walked backwards with the
 * rotations swapped.
 */
function decryptBlock(
  cipher: Bytes,
  io: number,
  plain: Bytes,
  oo: number,
  { s0, s1, s2, s3, subKeys: sKey }: Session
): void {
  assertRange(cipher, io, TWOFISH_BLOCK_BYTES, "ciphertext block");
  assertRange(plain, oo, TWOFISH_BLOCK_BYTES, "plaintext block");

  let x2 = readU32LE(cipher, io) ^ sKey[4];
  let x3 = readU32LE(cipher, io + 4) ^ sKey[5];
  let x0 = readU32LE(cipher, io + 8) ^ sKey[6];
  let x1 = readU32LE(cipher, io + 12) ^ sKey[7];

  let t0: number;
  let t1: number;
  let k = ROUND_SUBKEYS + 2 * ROUNDS - 1; // last round subkey

  for (let R = 0; R < ROUNDS; R += 2) {
    t0 = s0[x2 & 0xff] ^ s1[(x2 >>> 8) & 0xff] ^ s2[(x2 >>> 16) & 0xff] ^ s3[x2 >>> 24];
    t1 = s0[x3 >>> 24] ^ s1[x3 & 0xff] ^ s2[(x3 >>> 8) & 0xff] ^ s3[(x3 >>> 16) & 0xff];

    x1 = rotr32(x1 ^ (t0 + 2 * t1 + sKey[k--]), 1); // ROR 1 undoes ROL 1
    x0 = rotl32(x0, 1) ^ (t0 + t1 + sKey[k--]); // ROL 1 undoes ROR 1

    t0 = s0[x0 & 0xff] ^ s1[(x0 >>> 8) & 0xff] ^ s2[(x0 >>> 16) & 0xff] ^ s3[x0 >>> 24];
    t1 = s0[x1 >>> 24] ^ s1[x1 & 0xff] ^ s2[(x1 >>> 8) & 0xff] ^ s3[(x1 >>> 16) & 0xff];

    x3 = rotr32(x3 ^ (t0 + 2 * t1 + sKey[k--]), 1);
    x2 = rotl32(x2, 1) ^ (t0 + t1 + sKey[k--]);
  }

  outputBlock(plain, oo, x0 ^ sKey[0], x1 ^ sKey[1], x2 ^ sKey[2], x3 ^ sKey[3]);
}

/**
 * A Twofish key schedule. Immutable once built, so one instance can serve any
 * number of callers.
 *
 * Each call encrypts exactly one block with nothing chained between calls
 * (ECB). Wrap it in a proper mode of operation before using it on real data.
 */
export class Twofish implements BlockCipher {
  readonly blockSize = TWOFISH_BLOCK_BYTES;
  private readonly session: Session;

  /** @param key 16, 24 or 32 bytes */
  constructor(key: Bytes) {
    this.session = makeSession(key);
  }

  static new128(key: Bytes): Twofish {
    return Twofish.ofLength(key, 16);
  }

  static new192(key: Bytes): Twofish {
    return Twofish.ofLength(key, 24);
  }

  static new256(key: Bytes): Twofish {
    return Twofish.ofLength(key, 32);
  }

  private static ofLength(key: Bytes, bytes: number): Twofish {
    if (key.length !== bytes) throw new UnsupportedKeySizeError(key.length, [bytes]);
    return new Twofish(key);
  }

  get keySize(): KeySize {
    return this.session.keySize;
  }

  encrypt(block: Bytes): Uint8Array {
    assertBlock(block);
    const out = new Uint8Array(TWOFISH_BLOCK_BYTES);
    encryptBlock(block, 0, out, 0, this.session);
    return out;
  }

  decrypt(block: Bytes): Uint8Array {
    assertBlock(block);
    const out = new Uint8Array(TWOFISH_BLOCK_BYTES);
    decryptBlock(block, 0, out, 0, this.session);
    return out;
  }

  encryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void {
    encryptBlock(inp, inOff, out, outOff, this.session);
  }

  decryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void {
    decryptBlock(inp, inOff, out, outOff, this.session);
  }

  schedule(): TwofishSchedule {
    const { s0, s1, s2, s3, subKeys } = this.session;
    return {
      sBoxes: [s0.slice(), s1.slice(), s2.slice(), s3.slice()],
      whitening: subKeys.slice(0, ROUND_SUBKEYS),
      roundKeys: subKeys.slice(ROUND_SUBKEYS),
    };
  }

  [inspect.custom](): string {
    return "Twofish { ... }";
  }
}

function assertBlock(block: Bytes): void {
  if (block.length !== TWOFISH_BLOCK_BYTES)
    throw new ContractViolationError(
      `Twofish block must be ${TWOFISH_BLOCK_BYTES} bytes, got ${block.length}`
    );
}
