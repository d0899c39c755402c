import type { ExchangeId, MonitorConfig } from "../config/monitorConfig.js";
import type { MarketDataSource } from "../monitor/types.js";
import { BinanceSource } from "./binanceSource.js";
import { BybitSource } from "./bybitSource.js";
import { createHttpClient, type ExchangeSourceOptions, type HttpClient } from "./exchangeSource.js";
import { OkxSource } from "./okxSource.js";

const SOURCE_FACTORIES: Record<ExchangeId, (options: ExchangeSourceOptions) => MarketDataSource> = {
  binance: (options) => new BinanceSource(options),
  okx: (options) => new OkxSource(options),
  bybit: (options) => new BybitSource(options),
};

/**
 * One source per configured exchange. Throws ConfigError when an exchange
 * has no candle interval matching WINDOW_MIN.
 */
export function createSources(config: MonitorConfig, http?: HttpClient): MarketDataSource[] {
  const client = http ?? createHttpClient(config.requestTimeoutSeconds * 1000);
  return config.exchanges.map((id) =>
    SOURCE_FACTORIES[id]({
      http: client,
      windowMinutes: config.windowMinutes,
      quoteAssets: config.quoteAssets,
    })
  );
}

export { BinanceSource, BybitSource, OkxSource };
