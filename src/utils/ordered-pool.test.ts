import { describe, it, expect, vi } from "vitest";
import { createDeferred } from "./deferred.js";
import { mapOrdered } from "./ordered-pool.js";

describe("mapOrdered", () => {
  it("returns results in input order when tasks finish out of order", async () => {
    const deferreds = [0, 1, 2].map(() => createDeferred<string>());
    const pending = mapOrdered([0, 1, 2], 3, (i) => deferreds[i].promise);

    deferreds[2].resolve("c");
    deferreds[1].resolve("b");
    deferreds[0].resolve("a");

    await expect(pending).resolves.toEqual(["a", "b", "c"]);
  });

  it("never runs more than `concurrency` tasks at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const task = async (n: number) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
      return n * 2;
    };

    const results = await mapOrdered([1, 2, 3, 4, 5, 6, 7], 2, task);

    expect(results).toEqual([2, 4, 6, 8, 10, 12, 14]);
    expect(peak).toBe(2);
  });

  it("resolves to an empty array for no items", async () => {
    const task = vi.fn(async (n: number) => n);
    await expect(mapOrdered([], 4, task)).resolves.toEqual([]);
    expect(task).not.toHaveBeenCalled();
  });

  it("rejects with the first failure and starts no new tasks", async () => {
    const task = vi.fn(async (n: number) => {
      if (n === 1) throw new Error("boom");
      return n;
    });

    await expect(mapOrdered([0, 1, 2, 3], 1, task)).rejects.toThrow("boom");
    expect(task).toHaveBeenCalledTimes(2);
  });
});
