import { describe, test } from "vitest";
import { benchBytes, loadConfig, median, mibPerSecond } from "../src/comparison.ts";
import { hash } from "../src/algorithms/sha256.ts";
import { ContractViolationError } from "../src/algorithms/utils/errors.ts";

describe("benchBytes", () => {
  test("chains digests of the seed and a block counter", ({ expect }) => {
    const first = hash(new Uint8Array([0x78, 0, 0, 0, 0]));
    const second = hash(new Uint8Array([0x78, 0, 0, 0, 1]));
    const bytes = benchBytes(40, "x");

    expect(bytes).toHaveLength(40);
    expect(bytes.subarray(0, 32)).toStrictEqual(first);
    expect(bytes.subarray(32)).toStrictEqual(second.subarray(0, 8));
  });

  test("is repeatable per seed", ({ expect }) => {
    expect(benchBytes(100)).toStrictEqual(benchBytes(100));
    expect(benchBytes(16, "a")).not.toStrictEqual(benchBytes(16, "b"));
    expect(benchBytes(0)).toHaveLength(0);
  });
});

describe("statistics", () => {
  test("median", ({ expect }) => {
    const xs = [3, 1, 2];

    expect(median(xs)).toBe(2);
    expect(xs).toStrictEqual([3, 1, 2]);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBeNaN();
  });

  test("mibPerSecond", ({ expect }) => {
    expect(mibPerSecond(1024 * 1024, 1e9)).toBe(1);
    expect(mibPerSecond(1024 * 1024, 5e8)).toBe(2);
  });
});

describe("loadConfig", () => {
  test("defaults", ({ expect }) => {
    expect(loadConfig(["node", "comparison.ts"], {})).toStrictEqual({
      targetNs: 300_000_000n,
      samples: 5,
    });
  });

  test("argv wins over the environment", ({ expect }) => {
    const config = loadConfig(["node", "comparison.ts", "100"], {
      BENCH_TARGET_MS: "50",
      BENCH_SAMPLES: "9",
    });

    expect(config).toStrictEqual({ targetNs: 100_000_000n, samples: 9 });
    expect(loadConfig(["node", "comparison.ts"], { BENCH_TARGET_MS: "50" }).targetNs).toBe(
      50_000_000n,
    );
  });

  test("rejects bad values", ({ expect }) => {
    expect(() => loadConfig(["node", "comparison.ts", "abc"], {})).toThrow(
      "bad target milliseconds: abc",
    );
    expect(() => loadConfig(["node", "comparison.ts"], { BENCH_SAMPLES: "0" })).toThrow(
      ContractViolationError,
    );
  });
});
