/**
 * Binance spot klines: GET /api/v3/klines
 * Row: [openTime, open, high, low, close, volume, closeTime, quoteVolume, ...]
 */

import axios from "axios";
import { ConfigError } from "../utils/errors.js";
import { ExchangeSource, volumeFromRows, type CandleLookup, type ExchangeSourceOptions } from "./exchangeSource.js";

const BINANCE_API_URL = "https://api.binance.com/api/v3/klines";
const INVALID_SYMBOL_CODE = -1121;

const BINANCE_INTERVALS: Record<number, string> = {
  1: "1m",
  3: "3m",
  5: "5m",
  15: "15m",
  30: "30m",
  60: "1h",
  120: "2h",
  240: "4h",
  360: "6h",
  480: "8h",
  720: "12h",
  1440: "1d",
};

export class BinanceSource extends ExchangeSource {
  readonly id = "binance" as const;
  private readonly interval: string;

  constructor(options: ExchangeSourceOptions) {
    super(options);
    const interval = BINANCE_INTERVALS[options.windowMinutes];
    if (!interval) {
      throw new ConfigError(`binance has no ${options.windowMinutes}m kline interval`);
    }
    this.interval = interval;
  }

  protected marketFor(symbol: string, quote: string): string {
    return `${symbol}${quote}`;
  }

  protected isMarketAbsent(err: unknown): boolean {
    if (!axios.isAxiosError(err) || err.response?.status !== 400) return false;
    const data: unknown = err.response.data;
    return typeof data === "object" && data !== null && "code" in data && data.code === INVALID_SYMBOL_CODE;
  }

  protected async lookupCandle(market: string, windowStart: number, signal?: AbortSignal): Promise<CandleLookup> {
    const { data } = await this.http.get<unknown>(BINANCE_API_URL, {
      params: {
        symbol: market,
        interval: this.interval,
        startTime: windowStart,
        endTime: windowStart + this.windowMs - 1,
        limit: 1,
      },
      signal,
    });
    return volumeFromRows(data, windowStart, 5);
  }
}
