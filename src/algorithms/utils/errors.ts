/**
 * Thrown when a caller breaks an API precondition: a raw SHA-256 update that is
 * not block-aligned, a hasher used after `finish`, a Twofish key or block of the
 * wrong size. These are programming errors, not conditions to retry.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

export class UnsupportedKeySizeError extends ContractViolationError {
  readonly keyLength: number;

  constructor(keyLength: number, expected: readonly number[] = [16, 24, 32]) {
    super(
      `Twofish key must be ${expected.join(", ")} bytes, got ${keyLength}`
    );
    this.name = "UnsupportedKeySizeError";
    this.keyLength = keyLength;
  }
}

/**
 * Thrown when a SHA-256 accumulator would pass 2^61 bytes (the bit length must
 * fit the 64-bit length field). The accumulator is left untouched, so the
 * caller may catch this and carry on.
 */
export class HashLimitExceededError extends Error {
  readonly attemptedBytes: bigint;

  constructor(attemptedBytes: bigint) {
    super(`cannot hash ${attemptedBytes} bytes: the limit is 2^61 bytes`);
    this.name = "HashLimitExceededError";
    this.attemptedBytes = attemptedBytes;
  }
}
