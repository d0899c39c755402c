import { describe, it, expect } from "vitest";
import { formatStatus, formatTop } from "../src/bot/commands.js";
import type { SpikeRecord } from "../src/monitor/types.js";

function spike(overrides: Partial<SpikeRecord>): SpikeRecord {
  return {
    at: Date.UTC(2026, 0, 15, 9, 5, 7),
    symbol: "BTC",
    name: "Bitcoin",
    reason: "BOTH",
    observed: 2500,
    mean: 1000,
    std: 333,
    pctChange: 150,
    zScore: 4.5,
    sources: ["binance"],
    ...overrides,
  };
}

describe("formatStatus", () => {
  it("says so when nothing has fired", () => {
    expect(formatStatus([])).toBe("No spikes yet. Monitoring is running ✅");
  });

  it("lists spikes newest first as given", () => {
    const text = formatStatus([
      spike({}),
      spike({ symbol: "ETH", pctChange: null, zScore: null, at: Date.UTC(2026, 0, 15, 8, 0, 0) }),
    ]);

    expect(text).toBe(
      ["Latest spikes:", "- BTC: +150% (z=4.50) at 09:05:07 UTC", "- ETH: n/a (z=n/a) at 08:00:00 UTC"].join("\n")
    );
  });
});

describe("formatTop", () => {
  it("lists the monitored symbols", () => {
    const universe = {
      entries: [
        { symbol: "BTC", name: "Bitcoin" },
        { symbol: "ETH", name: "Ethereum" },
      ],
      refreshedAt: 0,
    };
    expect(formatTop(universe)).toBe("Top-2 by market cap (CoinGecko):\nBTC, ETH");
  });

  it("explains an empty universe", () => {
    expect(formatTop(null)).toBe("The monitored universe is empty (waiting for the first refresh).");
    expect(formatTop({ entries: [], refreshedAt: 1 })).toBe(
      "The monitored universe is empty (waiting for the first refresh)."
    );
  });
});
