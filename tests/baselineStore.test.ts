import { describe, it, expect, beforeEach } from "vitest";
import { BaselineStore, computeBaseline } from "../src/monitor/baselineStore.js";
import { MemoryStateStore } from "../src/state/memoryStateStore.js";
import { NotEnoughDataError } from "../src/utils/errors.js";

const W = 5 * 60 * 1000;
const LOOKBACK = 60 * 60 * 1000;
const CURRENT = 120 * W;

describe("computeBaseline", () => {
  it("uses the sample standard deviation (n - 1)", () => {
    const baseline = computeBaseline([2, 4, 4, 4, 5, 5, 7, 9]);

    expect(baseline.mean).toBe(5);
    expect(baseline.count).toBe(8);
    expect(baseline.std).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it("has zero spread for identical samples", () => {
    expect(computeBaseline([700, 700, 700])).toEqual({ mean: 700, std: 0, count: 3 });
  });
});

describe("BaselineStore", () => {
  let state: MemoryStateStore;
  let store: BaselineStore;

  beforeEach(() => {
    state = new MemoryStateStore();
    store = new BaselineStore(state, { lookbackMs: LOOKBACK, minSamples: 2 });
  });

  it("excludes the evaluated window from its own baseline", async () => {
    await store.record("BTC", CURRENT - 3 * W, 100);
    await store.record("BTC", CURRENT - 2 * W, 200);
    await store.record("BTC", CURRENT - W, 300);
    await store.record("BTC", CURRENT, 10_000);

    expect(await store.baseline("BTC", CURRENT)).toEqual({ mean: 200, std: 100, count: 3 });
  });

  it("keeps the first sample written for a window", async () => {
    expect(await store.record("BTC", CURRENT, 100)).toBe(true);
    expect(await store.record("BTC", CURRENT, 999)).toBe(false);

    expect(await store.samples("BTC")).toEqual([{ symbol: "BTC", windowStart: CURRENT, volume: 100 }]);
    expect(await store.hasSample("BTC", CURRENT)).toBe(true);
    expect(await store.hasSample("BTC", CURRENT + W)).toBe(false);
  });

  it("throws NotEnoughData below the minimum sample count", async () => {
    await store.record("BTC", CURRENT - W, 100);

    await expect(store.baseline("BTC", CURRENT)).rejects.toBeInstanceOf(NotEnoughDataError);
    await expect(store.baseline("ETH", CURRENT)).rejects.toBeInstanceOf(NotEnoughDataError);
  });

  it("never goes below two samples even when configured lower", async () => {
    const loose = new BaselineStore(state, { lookbackMs: LOOKBACK, minSamples: 1 });
    await loose.record("BTC", CURRENT - W, 100);

    await expect(loose.baseline("BTC", CURRENT)).rejects.toBeInstanceOf(NotEnoughDataError);
  });

  it("evicts samples older than the lookback on record", async () => {
    await store.record("BTC", CURRENT, 1);
    await store.record("BTC", CURRENT + LOOKBACK + W, 2);

    expect((await store.samples("BTC")).map((s) => s.volume)).toEqual([2]);
  });

  it("leaves samples out of the baseline once they fall outside the lookback", async () => {
    await store.record("BTC", CURRENT - W, 100);
    await store.record("BTC", CURRENT - 2 * W, 300);
    // written last, so nothing newer evicts it
    await store.record("BTC", CURRENT - LOOKBACK - W, 1_000_000);

    expect(await store.samples("BTC")).toHaveLength(3);
    expect(await store.baseline("BTC", CURRENT)).toEqual({ mean: 200, std: Math.sqrt(20000), count: 2 });
  });

  it("includes a sample exactly one lookback old", async () => {
    await store.record("BTC", CURRENT - LOOKBACK, 100);
    await store.record("BTC", CURRENT - W, 300);

    const baseline = await store.baseline("BTC", CURRENT);
    expect(baseline.count).toBe(2);
    expect(baseline.mean).toBe(200);
  });

  it("keeps symbols apart and discards one on request", async () => {
    await store.record("BTC", CURRENT - W, 1);
    await store.record("ETH", CURRENT - W, 2);

    await store.discard("BTC");

    expect(await store.samples("BTC")).toEqual([]);
    expect(await store.samples("ETH")).toHaveLength(1);
  });
});
