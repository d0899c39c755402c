/**
 * Bybit v5 spot kline: GET /v5/market/kline
 * Envelope { retCode, retMsg, result: { list: [[start, o, h, l, c, volume, turnover]] } }
 */

import { ConfigError } from "../utils/errors.js";
import { ExchangeSource, volumeFromRows, type CandleLookup, type ExchangeSourceOptions } from "./exchangeSource.js";

const BYBIT_API_URL = "https://api.bybit.com/v5/market/kline";
const INVALID_SYMBOL_CODE = 10001;

const BYBIT_INTERVALS: Record<number, string> = {
  1: "1",
  3: "3",
  5: "5",
  15: "15",
  30: "30",
  60: "60",
  120: "120",
  240: "240",
  360: "360",
  720: "720",
  1440: "D",
};

export class BybitSource extends ExchangeSource {
  readonly id = "bybit" as const;
  private readonly interval: string;

  constructor(options: ExchangeSourceOptions) {
    super(options);
    const interval = BYBIT_INTERVALS[options.windowMinutes];
    if (!interval) {
      throw new ConfigError(`bybit has no ${options.windowMinutes}m kline interval`);
    }
    this.interval = interval;
  }

  protected marketFor(symbol: string, quote: string): string {
    return `${symbol}${quote}`;
  }

  protected async lookupCandle(market: string, windowStart: number, signal?: AbortSignal): Promise<CandleLookup> {
    const { data } = await this.http.get<unknown>(BYBIT_API_URL, {
      params: {
        category: "spot",
        symbol: market,
        interval: this.interval,
        start: windowStart,
        end: windowStart + this.windowMs - 1,
        limit: 1,
      },
      signal,
    });

    if (typeof data !== "object" || data === null || !("retCode" in data)) {
      throw new Error("Invalid kline response from Bybit");
    }
    if (data.retCode === INVALID_SYMBOL_CODE) {
      return { kind: "absent" };
    }
    if (data.retCode !== 0) {
      const msg = "retMsg" in data ? String(data.retMsg) : "unknown error";
      throw new Error(`Bybit error ${String(data.retCode)}: ${msg}`);
    }

    const result = "result" in data ? data.result : null;
    const list = typeof result === "object" && result !== null && "list" in result ? result.list : null;
    return volumeFromRows(list, windowStart, 5);
  }
}
