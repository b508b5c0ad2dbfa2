import { describe, expect, it } from "vitest";

import { resolveConcurrency, runPool } from "./pool.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runPool", () => {
  it("keeps input order regardless of completion order", async () => {
    const results = await runPool([30, 5, 15, 0], { concurrency: 4 }, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:5", "2:15", "3:0"]);
  });

  it("never runs more than the requested number of workers", async () => {
    let active = 0;
    let peak = 0;

    await runPool(Array.from({ length: 10 }, (_, i) => i), { concurrency: 3 }, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(2);
      active -= 1;
    });

    expect(peak).toBe(3);
  });

  it("handles an empty list", async () => {
    await expect(runPool([], { concurrency: 8 }, async () => 1)).resolves.toEqual([]);
  });

  it("rejects with the first worker failure", async () => {
    await expect(
      runPool([1, 2], { concurrency: 1 }, async (item) => {
        if (item === 2) throw new Error("boom");
        return item;
      }),
    ).rejects.toThrow("boom");
  });
});

describe("resolveConcurrency", () => {
  it("forces one worker without multiprocessing", () => {
    expect(resolveConcurrency({ multiprocessing: false, jobs: 8 })).toBe(1);
  });

  it("uses the requested job count", () => {
    expect(resolveConcurrency({ multiprocessing: true, jobs: 3 })).toBe(3);
  });
});
