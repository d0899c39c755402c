/**
 * OKX candles: GET /api/v5/market/candles
 * Envelope { code, msg, data: [[ts, o, h, l, c, vol, volCcy, volCcyQuote, confirm]] }
 * newest first; `after` returns records older than the given ts.
 * confirm is "0" while the candle is still open.
 */

import { ConfigError } from "../utils/errors.js";
import { ExchangeSource, volumeFromRows, type CandleLookup, type ExchangeSourceOptions } from "./exchangeSource.js";

const OKX_API_URL = "https://www.okx.com/api/v5/market/candles";
const INSTRUMENT_NOT_FOUND_CODE = "51001";
const CONFIRM_INDEX = 8;

const isConfirmed = (row: unknown[]) => row[CONFIRM_INDEX] === "1";

const OKX_BARS: Record<number, string> = {
  1: "1m",
  3: "3m",
  5: "5m",
  15: "15m",
  30: "30m",
  60: "1H",
  120: "2H",
  240: "4H",
  360: "6Hutc",
  720: "12Hutc",
  1440: "1Dutc",
};

export class OkxSource extends ExchangeSource {
  readonly id = "okx" as const;
  private readonly bar: string;

  constructor(options: ExchangeSourceOptions) {
    super(options);
    const bar = OKX_BARS[options.windowMinutes];
    if (!bar) {
      throw new ConfigError(`okx has no ${options.windowMinutes}m candle bar`);
    }
    this.bar = bar;
  }

  protected marketFor(symbol: string, quote: string): string {
    return `${symbol}-${quote}`;
  }

  protected async lookupCandle(market: string, windowStart: number, signal?: AbortSignal): Promise<CandleLookup> {
    const { data } = await this.http.get<unknown>(OKX_API_URL, {
      params: {
        instId: market,
        bar: this.bar,
        after: windowStart + 1,
        limit: 1,
      },
      signal,
    });

    if (typeof data !== "object" || data === null || !("code" in data)) {
      throw new Error("Invalid candles response from OKX");
    }
    if (data.code === INSTRUMENT_NOT_FOUND_CODE) {
      return { kind: "absent" };
    }
    if (data.code !== "0") {
      const msg = "msg" in data ? String(data.msg) : "unknown error";
      throw new Error(`OKX error ${String(data.code)}: ${msg}`);
    }
    return volumeFromRows("data" in data ? data.data : null, windowStart, 5, isConfirmed);
  }
}
