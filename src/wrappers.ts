import { hash } from "./algorithms/sha256.ts";
import { Twofish } from "./algorithms/twofish.ts";
import { type Input, hex, normalizeKey } from "./algorithms/utils/util.ts";

/** SHA-256 of bytes or a UTF-8 string */
export function sha256(input: Input): Uint8Array {
  return hash(input);
}

/** SHA-256 as lowercase hex */
export function sha256Hex(input: Input): string {
  return hex.fromBytes(hash(input));
}

/**
 * Twofish context from raw key bytes, or a hex or base64 string. The decoded
 * key must be 16, 24 or 32 bytes.
 */
export function createTwofish(key: Input): Twofish {
  return new Twofish(normalizeKey(key));
}

/** Also export the raw API */
export {
  RawSha256,
  BufferedSha256,
  hash,
  HASH_BYTES,
  SHA256_BLOCK_BYTES,
  MAX_HASH_BYTES,
} from "./algorithms/sha256.ts";
export {
  Twofish,
  TWOFISH_BLOCK_BYTES,
  type KeySize,
  type TwofishSchedule,
} from "./algorithms/twofish.ts";
export type { BlockCipher } from "./algorithms/utils/block-cipher.ts";
export {
  ContractViolationError,
  UnsupportedKeySizeError,
  HashLimitExceededError,
} from "./algorithms/utils/errors.ts";
export { hex, toBytes, type Bytes, type Input } from "./algorithms/utils/util.ts";
