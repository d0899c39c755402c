import { describe, it, expect } from "vitest";
import { buildVerdict, evaluateSignal } from "../src/monitor/signalEvaluator.js";

const thresholds = { pctThreshold: 200, zThreshold: 3 };

describe("evaluateSignal", () => {
  it("reports BOTH when relative and z-score rules fire", () => {
    const result = evaluateSignal(3100, 1000, 100, thresholds);

    expect(result.triggered).toBe(true);
    expect(result.reason).toBe("BOTH");
    expect(result.zScore).toBe(21);
    expect(result.pctChange).toBe(210);
  });

  it("reports NONE below both thresholds", () => {
    const result = evaluateSignal(1250, 1000, 100, thresholds);

    expect(result.triggered).toBe(false);
    expect(result.reason).toBe("NONE");
    expect(result.zScore).toBe(2.5);
    expect(result.pctChange).toBe(25);
  });

  it("fires ZSCORE alone when the relative rule does not", () => {
    expect(evaluateSignal(1400, 1000, 100, thresholds).reason).toBe("ZSCORE");
  });

  it("fires PCT alone when the spread is wide", () => {
    // z = 2100 / 1000 = 2.1
    expect(evaluateSignal(3100, 1000, 1000, thresholds).reason).toBe("PCT");
  });

  it("treats the z-score threshold as inclusive", () => {
    expect(evaluateSignal(1300, 1000, 100, thresholds).reason).toBe("ZSCORE");
  });

  it("treats the relative threshold as strict", () => {
    expect(evaluateSignal(3000, 1000, 0, thresholds).reason).toBe("NONE");
    expect(evaluateSignal(3001, 1000, 0, thresholds).reason).toBe("PCT");
  });

  it("never fires ZSCORE when std is zero", () => {
    for (const observed of [0, 500, 1000, 2999, 1_000_000]) {
      const result = evaluateSignal(observed, 1000, 0, { pctThreshold: 1e9, zThreshold: 0.0001 });
      expect(result.zScore).toBeNull();
      expect(result.reason).toBe("NONE");
    }
  });

  it("fires ZSCORE exactly when (observed - mean) / std reaches the threshold", () => {
    const means = [10, 1000, 25000];
    const stds = [1, 37.5, 400];
    const offsets = [-3, -0.5, 0, 1.2, 2.99, 3, 7];

    for (const mean of means) {
      for (const std of stds) {
        for (const k of offsets) {
          const observed = mean + k * std;
          const result = evaluateSignal(observed, mean, std, thresholds);
          const expected = (observed - mean) / std >= thresholds.zThreshold;
          expect(result.reason === "ZSCORE" || result.reason === "BOTH").toBe(expected);
        }
      }
    }
  });

  it("returns the same verdict for the same inputs", () => {
    expect(evaluateSignal(1800, 900, 120, thresholds)).toEqual(evaluateSignal(1800, 900, 120, thresholds));
  });

  it("leaves pctChange empty for a zero mean", () => {
    expect(evaluateSignal(10, 0, 0, thresholds).pctChange).toBeNull();
  });
});

describe("buildVerdict", () => {
  it("carries the window and baseline into the verdict", () => {
    const verdict = buildVerdict("BTC", 1_700_000_000_000, 3100, { mean: 1000, std: 100, count: 12 }, thresholds);

    expect(verdict).toEqual({
      symbol: "BTC",
      windowStart: 1_700_000_000_000,
      triggered: true,
      reason: "BOTH",
      observedVolume: 3100,
      baselineMean: 1000,
      baselineStd: 100,
      pctChange: 210,
      zScore: 21,
    });
  });
});
