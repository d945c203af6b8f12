import { describe, it, expect } from "vitest";
import { runPool, runWithBudget } from "../../src/systems/research/harness/pool.js";

describe("runPool", () => {
  it("keeps item order", async () => {
    const results = await runPool([30, 1, 10], 3, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return index;
    });
    expect(results).toEqual([0, 1, 2]);
  });

  it("handles an empty list", async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});

describe("runWithBudget", () => {
  it("returns the value when work finishes in time", async () => {
    expect(await runWithBudget(async () => "done", 100)).toEqual({ timedOut: false, value: "done" });
  });

  it("aborts the signal and reports a timeout on expiry", async () => {
    let seen: AbortSignal | undefined;
    const result = await runWithBudget(
      (signal) =>
        new Promise<string>((_resolve, reject) => {
          seen = signal;
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      10
    );

    expect(result).toEqual({ timedOut: true });
    expect(seen?.aborted).toBe(true);
  });

  it("propagates errors thrown before expiry", async () => {
    await expect(
      runWithBudget(() => {
        throw new Error("sync failure");
      }, 100)
    ).rejects.toThrow("sync failure");
  });
});
