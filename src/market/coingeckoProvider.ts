import axios from "axios";
import { info, warn } from "../utils/logger.js";
import { UniverseFetchError, describeError } from "../utils/errors.js";
import type { HttpClient } from "../sources/exchangeSource.js";
import type { CapitalizationProvider, UniverseEntry } from "../monitor/types.js";

const MAX_PER_PAGE = 250;

export interface CoinGeckoProviderOptions {
  http: HttpClient;
  baseUrl: string;
  maxRetries?: number;
  initialDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Sleep for specified milliseconds, waking early on abort
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

function throwIfAborted(signal: AbortSignal | undefined, attempts: number): void {
  if (signal?.aborted) {
    throw new UniverseFetchError("Top coins request aborted", attempts);
  }
}

function isRetryable(err: unknown): boolean {
  if (!axios.isAxiosError(err)) return false;
  const status = err.response?.status;
  if (status === 429 || (status !== undefined && status >= 500)) return true;
  return err.code === "ECONNRESET" || err.code === "ETIMEDOUT" || err.code === "ECONNABORTED" || err.code === "ECONNREFUSED";
}

/**
 * Keep rows with a symbol; the name falls back to the symbol
 */
export function parseMarkets(data: unknown): UniverseEntry[] {
  if (!Array.isArray(data)) {
    throw new Error("Invalid /coins/markets response from CoinGecko");
  }

  const entries: UniverseEntry[] = [];
  for (const row of data) {
    if (typeof row !== "object" || row === null || !("symbol" in row) || typeof row.symbol !== "string") {
      continue;
    }
    const symbol = row.symbol.trim().toUpperCase();
    if (!symbol) continue;
    const name = "name" in row && typeof row.name === "string" && row.name ? row.name : symbol;
    entries.push({ symbol, name });
  }
  return entries;
}

/**
 * Top coins by market cap from CoinGecko, with retry logic
 */
export class CoinGeckoProvider implements CapitalizationProvider {
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: CoinGeckoProviderOptions) {
    this.maxRetries = options.maxRetries ?? 5;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
  }

  async topSymbols(n: number, signal?: AbortSignal): Promise<UniverseEntry[]> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (attempt > 0) {
        throwIfAborted(signal, attempt);
        const delay = Math.min(this.initialDelayMs * Math.pow(2, attempt - 1), 30000);
        warn("CoinGecko", `Retry attempt ${attempt + 1}/${this.maxRetries} after ${delay}ms delay...`);
        await this.sleep(delay, signal);
      }
      throwIfAborted(signal, attempt);

      try {
        const { data } = await this.options.http.get<unknown>(`${this.options.baseUrl}/coins/markets`, {
          params: {
            vs_currency: "usd",
            order: "market_cap_desc",
            per_page: Math.min(n, MAX_PER_PAGE),
            page: 1,
          },
          signal,
        });

        const entries = parseMarkets(data);
        info("CoinGecko", `Fetched ${entries.length} coins by market cap`);
        return entries;
      } catch (err) {
        lastError = err;
        if (isRetryable(err)) {
          continue;
        }
        throw new UniverseFetchError(`Failed to fetch top coins: ${describeError(err)}`, attempt + 1);
      }
    }

    throw new UniverseFetchError(
      `Failed to fetch top coins after ${this.maxRetries} attempts: ${describeError(lastError)}`,
      this.maxRetries
    );
  }
}
