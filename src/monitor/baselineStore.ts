/**
 * Baseline Store
 *
 * Rolling per-symbol history of window volumes, one sorted set per symbol
 * scored by window start. Samples older than the lookback horizon are pruned
 * on record(); there is no background task.
 */

import { NotEnoughDataError } from "../utils/errors.js";
import type { StateStore } from "../state/stateStore.js";
import type { Baseline, MarketSymbol, VolumeSample } from "./types.js";

export interface BaselineStoreOptions {
  lookbackMs: number;
  minSamples: number;
}

interface StoredSample {
  windowStart: number;
  volume: number;
}

const sampleKey = (symbol: MarketSymbol) => `baseline:samples:${symbol}`;

function parseSample(raw: string): StoredSample | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "windowStart" in parsed &&
      "volume" in parsed &&
      typeof parsed.windowStart === "number" &&
      typeof parsed.volume === "number"
    ) {
      return { windowStart: parsed.windowStart, volume: parsed.volume };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Mean and sample standard deviation (n - 1)
 */
export function computeBaseline(volumes: number[]): Baseline {
  const count = volumes.length;
  if (count === 0) {
    return { mean: 0, std: 0, count: 0 };
  }

  const mean = volumes.reduce((sum, v) => sum + v, 0) / count;
  if (count < 2) {
    return { mean, std: 0, count };
  }

  const squared = volumes.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return { mean, std: Math.sqrt(squared / (count - 1)), count };
}

export class BaselineStore {
  private readonly lookbackMs: number;
  private readonly minSamples: number;

  constructor(private readonly store: StateStore, options: BaselineStoreOptions) {
    this.lookbackMs = options.lookbackMs;
    this.minSamples = Math.max(2, options.minSamples);
  }

  /**
   * Append a sample. Samples are immutable: a second record for the same
   * window is ignored and returns false.
   */
  async record(symbol: MarketSymbol, windowStart: number, volume: number): Promise<boolean> {
    const key = sampleKey(symbol);

    await this.store.zremrangebyscore(key, "-inf", windowStart - this.lookbackMs - 1);

    if (await this.hasSample(symbol, windowStart)) {
      return false;
    }

    const sample: StoredSample = { windowStart, volume };
    await this.store.zadd(key, windowStart, JSON.stringify(sample));
    return true;
  }

  async hasSample(symbol: MarketSymbol, windowStart: number): Promise<boolean> {
    const existing = await this.store.zrangebyscore(sampleKey(symbol), windowStart, windowStart);
    return existing.length > 0;
  }

  /**
   * Baseline over samples in [windowStart - lookback, windowStart).
   * The evaluated window itself is never part of its own baseline.
   */
  async baseline(symbol: MarketSymbol, windowStart: number): Promise<Baseline> {
    const raw = await this.store.zrangebyscore(
      sampleKey(symbol),
      windowStart - this.lookbackMs,
      windowStart - 1
    );
    const volumes = raw
      .map(parseSample)
      .filter((s): s is StoredSample => s !== null)
      .map((s) => s.volume);

    if (volumes.length < this.minSamples) {
      throw new NotEnoughDataError(symbol, volumes.length, this.minSamples);
    }

    return computeBaseline(volumes);
  }

  async samples(symbol: MarketSymbol): Promise<VolumeSample[]> {
    const raw = await this.store.zrangebyscore(sampleKey(symbol), "-inf", "+inf");
    return raw
      .map(parseSample)
      .filter((s): s is StoredSample => s !== null)
      .map((s) => ({ symbol, windowStart: s.windowStart, volume: s.volume }));
  }

  async discard(symbol: MarketSymbol): Promise<void> {
    await this.store.del(sampleKey(symbol));
  }
}
