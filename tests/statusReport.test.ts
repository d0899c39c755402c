import { describe, it, expect } from "vitest";
import { formatStatusReport } from "../src/cron/statusReport.js";
import type { CycleSummary } from "../src/monitor/cycleOrchestrator.js";

const NOW = Date.UTC(2026, 0, 15, 13, 0);

const lastCycle: CycleSummary = {
  windowStart: Date.UTC(2026, 0, 15, 12, 50),
  symbols: 50,
  recorded: 48,
  evaluated: 45,
  alerted: 2,
  suppressed: 1,
  noSource: 1,
  notEnoughData: 3,
  alreadyRecorded: 0,
  failed: 1,
  durationMs: 4200,
};

describe("formatStatusReport", () => {
  it("summarizes the running monitor", () => {
    const text = formatStatusReport({
      now: NOW,
      universeSize: 50,
      lastCycle,
      totalAlerts: 7,
      completedCycles: 60,
      nextUniverseRefresh: NOW + 90 * 60_000,
    });

    expect(text).toBe(
      "Universe: 50 symbols | Cycles: 60 | Alerts since start: 7 | " +
        "Last cycle: window 2026-01-15T12:50:00.000Z recorded=48 evaluated=45 alerts=2 noSource=1 failed=1 | " +
        "Next universe refresh in 90 min"
    );
  });

  it("handles a monitor that has not polled yet", () => {
    const text = formatStatusReport({
      now: NOW,
      universeSize: 0,
      lastCycle: null,
      totalAlerts: 0,
      completedCycles: 0,
      nextUniverseRefresh: null,
    });

    expect(text).toBe("Universe: 0 symbols | Cycles: 0 | Alerts since start: 0 | Last cycle: none yet");
  });

  it("never reports a negative wait", () => {
    const text = formatStatusReport({
      now: NOW,
      universeSize: 10,
      lastCycle: null,
      totalAlerts: 0,
      completedCycles: 3,
      nextUniverseRefresh: NOW - 60_000,
    });

    expect(text.endsWith("Next universe refresh in 0 min")).toBe(true);
  });
});
