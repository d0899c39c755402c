/**
 * Exchange market-data source
 *
 * Shared quote fallback and failure classification for the REST candle
 * sources. Subclasses only know how to ask their exchange for the candle that
 * opens at a given window start.
 */

import axios, { type AxiosInstance } from "axios";
import { SourceUnavailableError, describeError } from "../utils/errors.js";
import type { ExchangeId } from "../config/monitorConfig.js";
import type { MarketDataSource, MarketSymbol } from "../monitor/types.js";

export type HttpClient = Pick<AxiosInstance, "get">;

export type CandleLookup =
  | { kind: "volume"; volume: number }
  | { kind: "absent" } // market does not exist on the exchange
  | { kind: "missing" }; // market exists, candle not (yet) there

export interface ExchangeSourceOptions {
  http: HttpClient;
  windowMinutes: number;
  quoteAssets: string[];
}

export function createHttpClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: {
      "User-Agent": "volume-spike-monitor/1.0",
      Accept: "application/json",
    },
  });
}

export function isTimeoutError(err: unknown): boolean {
  return axios.isAxiosError(err) && (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT");
}

export function toNumber(value: unknown): number | null {
  if (typeof value !== "number" && typeof value !== "string") return null;
  const parsed = typeof value === "number" ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Pick the row whose open time equals windowStart and read its volume column.
 * A row that isClosed rejects is still forming and counts as missing.
 */
export function volumeFromRows(
  rows: unknown,
  windowStart: number,
  volumeIndex: number,
  isClosed?: (row: unknown[]) => boolean
): CandleLookup {
  if (!Array.isArray(rows)) {
    return { kind: "missing" };
  }

  for (const row of rows) {
    if (!Array.isArray(row)) continue;
    if (toNumber(row[0]) !== windowStart) continue;
    if (isClosed && !isClosed(row)) return { kind: "missing" };
    const volume = toNumber(row[volumeIndex]);
    return volume === null ? { kind: "missing" } : { kind: "volume", volume };
  }
  return { kind: "missing" };
}

export abstract class ExchangeSource implements MarketDataSource {
  abstract readonly id: ExchangeId;

  protected readonly http: HttpClient;
  protected readonly windowMinutes: number;
  protected readonly windowMs: number;
  private readonly quoteAssets: string[];

  constructor(options: ExchangeSourceOptions) {
    this.http = options.http;
    this.windowMinutes = options.windowMinutes;
    this.windowMs = options.windowMinutes * 60 * 1000;
    this.quoteAssets = options.quoteAssets;
  }

  protected abstract marketFor(symbol: MarketSymbol, quote: string): string;

  protected abstract lookupCandle(market: string, windowStart: number, signal?: AbortSignal): Promise<CandleLookup>;

  /**
   * Whether an HTTP error means the market does not exist
   */
  protected isMarketAbsent(_err: unknown): boolean {
    return false;
  }

  async fetchWindowVolume(symbol: MarketSymbol, windowStart: number, signal?: AbortSignal): Promise<number> {
    for (const quote of this.quoteAssets) {
      if (quote === symbol) continue;

      const market = this.marketFor(symbol, quote);
      let lookup: CandleLookup;
      try {
        lookup = await this.lookupCandle(market, windowStart, signal);
      } catch (err) {
        if (this.isMarketAbsent(err)) continue;
        if (isTimeoutError(err)) {
          throw new SourceUnavailableError(this.id, symbol, "timeout", describeError(err));
        }
        throw new SourceUnavailableError(this.id, symbol, "error", describeError(err));
      }

      if (lookup.kind === "volume") return lookup.volume;
      if (lookup.kind === "missing") {
        throw new SourceUnavailableError(this.id, symbol, "candle_missing", market);
      }
    }

    throw new SourceUnavailableError(this.id, symbol, "symbol_absent");
  }
}
