import type { Bytes } from "./util.ts";

export interface BlockCipher {
  readonly blockSize: number;
  /** Encrypt exactly one block (blockSize bytes) */
  encryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void;
  /** Decrypt exactly one block (blockSize bytes) */
  decryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void;
}
