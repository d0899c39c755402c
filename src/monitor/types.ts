/**
 * Shared monitor types
 */

/**
 * Upper-case base asset, e.g. "BTC"
 */
export type MarketSymbol = string;

export interface UniverseEntry {
  symbol: MarketSymbol;
  name: string;
}

export interface MonitoredUniverse {
  entries: UniverseEntry[];
  refreshedAt: number; // ms
}

export interface VolumeSample {
  symbol: MarketSymbol;
  windowStart: number; // ms
  volume: number;
}

export interface Baseline {
  mean: number;
  std: number; // sample std, n - 1
  count: number;
}

export type SignalReason = "PCT" | "ZSCORE" | "BOTH" | "NONE";

export interface SignalVerdict {
  symbol: MarketSymbol;
  windowStart: number;
  triggered: boolean;
  reason: SignalReason;
  observedVolume: number;
  baselineMean: number;
  baselineStd: number;
  pctChange: number | null; // % above mean, null when mean is 0
  zScore: number | null; // null when std is 0
}

export interface AggregateResult {
  symbol: MarketSymbol;
  windowStart: number;
  volume: number;
  sources: string[]; // contributed
  failed: string[];
}

export interface SpikeRecord {
  at: number;
  symbol: MarketSymbol;
  name: string;
  reason: SignalReason;
  observed: number;
  mean: number;
  std: number;
  pctChange: number | null;
  zScore: number | null;
  sources: string[];
}

/**
 * One exchange. Resolves to the base-asset volume of the candle opening at
 * windowStart, or rejects with SourceUnavailableError.
 */
export interface MarketDataSource {
  readonly id: string;
  fetchWindowVolume(symbol: MarketSymbol, windowStart: number, signal?: AbortSignal): Promise<number>;
}

export interface CapitalizationProvider {
  topSymbols(n: number, signal?: AbortSignal): Promise<UniverseEntry[]>;
}

/**
 * Resolves once the message is delivered, rejects with NotifyError otherwise
 */
export interface Notifier {
  send(entry: UniverseEntry, verdict: SignalVerdict, aggregate: AggregateResult): Promise<void>;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Never steps backwards. Only for measuring durations.
 */
export const monotonicClock: Clock = {
  now: () => performance.now(),
};
