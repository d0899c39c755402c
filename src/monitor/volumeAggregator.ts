/**
 * Volume Aggregator
 *
 * Fans a window request out to every source and sums whatever comes back.
 * Failed sources are left out of the sum, never counted as zero.
 */

import {
  NoSourceAvailableError,
  SourceUnavailableError,
  describeError,
} from "../utils/errors.js";
import type { AggregateResult, MarketDataSource, MarketSymbol } from "./types.js";

export type SourceReading =
  | { ok: true; volume: number }
  | { ok: false; error: SourceUnavailableError };

export interface CollectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Reject with a timeout failure if the fetch outlives timeoutMs
 */
function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

async function readSource(
  source: MarketDataSource,
  symbol: MarketSymbol,
  windowStart: number,
  options: CollectOptions
): Promise<SourceReading> {
  try {
    const volume = await withTimeout(
      source.fetchWindowVolume(symbol, windowStart, options.signal),
      options.timeoutMs,
      () => new SourceUnavailableError(source.id, symbol, "timeout", `${options.timeoutMs}ms`)
    );

    if (!Number.isFinite(volume) || volume < 0) {
      return {
        ok: false,
        error: new SourceUnavailableError(source.id, symbol, "error", `invalid volume ${volume}`),
      };
    }
    return { ok: true, volume };
  } catch (err) {
    const failure =
      err instanceof SourceUnavailableError
        ? err
        : new SourceUnavailableError(source.id, symbol, "error", describeError(err));
    return { ok: false, error: failure };
  }
}

/**
 * Query every source in parallel for one symbol/window. Never throws and
 * never retries: a failed source is retried on the next poll cycle.
 */
export async function collectReadings(
  sources: readonly MarketDataSource[],
  symbol: MarketSymbol,
  windowStart: number,
  options: CollectOptions
): Promise<Map<string, SourceReading>> {
  const readings = await Promise.all(
    sources.map(async (source) => [source.id, await readSource(source, symbol, windowStart, options)] as const)
  );
  return new Map(readings);
}

/**
 * Sum the volumes of every source that returned a reading
 */
export function aggregateVolumes(
  symbol: MarketSymbol,
  windowStart: number,
  readings: ReadonlyMap<string, SourceReading>
): AggregateResult {
  let volume = 0;
  const sources: string[] = [];
  const failed: string[] = [];

  for (const [sourceId, reading] of readings) {
    if (reading.ok) {
      volume += reading.volume;
      sources.push(sourceId);
    } else {
      failed.push(sourceId);
    }
  }

  if (sources.length === 0) {
    throw new NoSourceAvailableError(symbol, windowStart, failed);
  }

  return { symbol, windowStart, volume, sources, failed };
}
