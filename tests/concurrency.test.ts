import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "../src/utils/concurrency.js";

describe("mapWithConcurrency", () => {
  it("keeps at most limit workers in flight and preserves order", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10, 2], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it("treats a limit below one as one", async () => {
    const order: number[] = [];
    await mapWithConcurrency([1, 2, 3], 0, async (n) => {
      order.push(n);
    });
    expect(order).toEqual([1, 2, 3]);
  });
});
