// Throughput of SHA-256 (one-shot and buffered) and Twofish block
// encrypt/decrypt, with the Twofish key schedule timed on its own.
//
// Run:
//   npm run bench                       (300 ms per measurement, 5 runs)
//   npm run bench -- 100                (100 ms per measurement)
//   BENCH_SAMPLES=9 npm run bench

import { pathToFileURL } from "node:url";

import { BufferedSha256, hash } from "./algorithms/sha256.ts";
import { TWOFISH_BLOCK_BYTES, Twofish } from "./algorithms/twofish.ts";
import { ContractViolationError } from "./algorithms/utils/errors.ts";
import { writeU32BE } from "./algorithms/utils/util.ts";

export interface BenchConfig {
  targetNs: bigint;
  samples: number;
}

export interface Row {
  subject: string;
  size: string;
  "MiB/s": number;
  "µs/op": number;
}

const MiB = 1024 * 1024;

/**
 * Reads the time per measurement (ms) from argv or BENCH_TARGET_MS and the
 * number of runs from BENCH_SAMPLES.
 */
export function loadConfig(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): BenchConfig {
  const rawTarget = argv[2] ?? env.BENCH_TARGET_MS ?? "300";
  const targetMs = Number(rawTarget);
  const samples = Number(env.BENCH_SAMPLES ?? 5);
  if (!Number.isInteger(targetMs) || targetMs <= 0)
    throw new ContractViolationError(`bad target milliseconds: ${rawTarget}`);
  if (!Number.isInteger(samples) || samples < 1)
    throw new ContractViolationError("BENCH_SAMPLES must be a positive integer");
  return { targetNs: BigInt(targetMs) * 1_000_000n, samples };
}

/**
 * Repeatable filler: SHA-256 of `seed` followed by a big-endian block
 * counter, one digest after another.
 */
export function benchBytes(length: number, seed = "bench"): Uint8Array {
  const prefix = new TextEncoder().encode(seed);
  const input = new Uint8Array(prefix.length + 4);
  input.set(prefix);

  const out = new Uint8Array(length);
  for (let off = 0, n = 0; off < length; off += 32, n++) {
    writeU32BE(input, prefix.length, n);
    out.set(hash(input).subarray(0, length - off), off);
  }
  return out;
}

export function median(xs: readonly number[]): number {
  if (xs.length === 0) return NaN;
  const a = [...xs].sort((u, v) => u - v);
  const mid = a.length >> 1;
  return a.length % 2 ? a[mid] : (a[mid - 1] + a[mid]) / 2;
}

/** Bytes per operation and nanoseconds per operation to MiB/s. */
export const mibPerSecond = (bytes: number, nsPerOp: number): number =>
  bytes / MiB / (nsPerOp / 1e9);

let sink = 0;

/**
 * Nanoseconds per call of `op`: a short calibration run sizes a batch that
 * should take `targetNs`, and the median of `samples` such batches is taken.
 */
function nsPerOp(op: () => number, { targetNs, samples }: BenchConfig): number {
  let calls = 0;
  const start = process.hrtime.bigint();
  const calibrateNs = targetNs / 10n;
  while (process.hrtime.bigint() - start < calibrateNs) {
    sink ^= op();
    calls++;
  }
  const perCall = Number(process.hrtime.bigint() - start) / Math.max(1, calls);
  const batch = Math.max(1, Math.round(Number(targetNs) / perCall));

  const runs: number[] = [];
  for (let s = 0; s < samples; s++) {
    const t0 = process.hrtime.bigint();
    for (let i = 0; i < batch; i++) sink ^= op();
    runs.push(Number(process.hrtime.bigint() - t0) / batch);
  }
  return median(runs);
}

function row(subject: string, size: string, bytes: number, ns: number): Row {
  return {
    subject,
    size,
    "MiB/s": bytes > 0 ? Number(mibPerSecond(bytes, ns).toFixed(1)) : NaN,
    "µs/op": Number((ns / 1000).toFixed(3)),
  };
}

function main() {
  const config = loadConfig();
  console.log(`Node ${process.version} on ${process.platform} ${process.arch}`);

  const rows: Row[] = [];
  const keys = [128, 192, 256].map((bits) => [bits, benchBytes(bits / 8, `key${bits}`)] as const);

  for (const [bits, key] of keys) {
    const ns = nsPerOp(() => new Twofish(key).blockSize, config);
    rows.push(row(`Twofish-${bits} key schedule`, `${key.length}B key`, 0, ns));
  }

  for (const [size, bytes] of [["64B", 64], ["4KiB", 4096], ["1MiB", MiB]] as const) {
    const data = benchBytes(bytes);

    rows.push(row("SHA-256", size, bytes, nsPerOp(() => hash(data)[0], config)));
    rows.push(row("SHA-256 buffered, 1000B chunks", size, bytes, nsPerOp(() => {
      const h = new BufferedSha256();
      for (let i = 0; i < bytes; i += 1000) h.update(data.subarray(i, i + 1000));
      return h.finish()[0];
    }, config)));

    const out = new Uint8Array(bytes);
    for (const [bits, key] of keys) {
      const cipher = new Twofish(key);
      rows.push(row(`Twofish-${bits} encrypt`, size, bytes, nsPerOp(() => {
        for (let i = 0; i < bytes; i += TWOFISH_BLOCK_BYTES) cipher.encryptBlock(data, i, out, i);
        return out[0];
      }, config)));
      rows.push(row(`Twofish-${bits} decrypt`, size, bytes, nsPerOp(() => {
        for (let i = 0; i < bytes; i += TWOFISH_BLOCK_BYTES) cipher.decryptBlock(data, i, out, i);
        return out[0];
      }, config)));
    }
  }

  console.table(rows);
  console.log(`sink: ${sink}`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main();
  } catch (e) {
    console.error(e);
    process.exit(1);
  }
}
