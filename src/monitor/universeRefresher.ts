/**
 * Universe Refresher
 *
 * Keeps the monitored top-N set. The set is fully replaced when the refresh
 * interval has elapsed; symbols that drop out lose their baseline and
 * cooldown state. A failed provider call keeps the previous set.
 */

import { info, warn, error as logError } from "../utils/logger.js";
import { UniverseFetchError, describeError } from "../utils/errors.js";
import type { KeyedLock } from "../utils/keyedLock.js";
import type { StateStore } from "../state/stateStore.js";
import type { BaselineStore } from "./baselineStore.js";
import type { CooldownTracker } from "./cooldownTracker.js";
import type { CapitalizationProvider, MarketSymbol, MonitoredUniverse, UniverseEntry } from "./types.js";

const UNIVERSE_KEY = "universe:current";

export interface UniverseRefresherOptions {
  provider: CapitalizationProvider;
  store: StateStore;
  baselines: BaselineStore;
  cooldowns: CooldownTracker;
  locks: KeyedLock;
  topN: number;
  refreshIntervalMs: number;
  retryDelayMs: number;
}

export interface RefreshOutcome {
  universe: MonitoredUniverse;
  changed: boolean;
  added: MarketSymbol[];
  removed: MarketSymbol[];
}

function isUniverseEntry(value: unknown): value is UniverseEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "symbol" in value &&
    "name" in value &&
    typeof value.symbol === "string" &&
    typeof value.name === "string"
  );
}

function parseUniverse(raw: string): MonitoredUniverse | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "entries" in parsed &&
      "refreshedAt" in parsed &&
      Array.isArray(parsed.entries) &&
      typeof parsed.refreshedAt === "number"
    ) {
      const entries: unknown[] = parsed.entries;
      return { entries: entries.filter(isUniverseEntry), refreshedAt: parsed.refreshedAt };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Upper-case, drop duplicates (first occurrence wins), keep the top n
 */
export function normalizeEntries(entries: UniverseEntry[], n: number): UniverseEntry[] {
  const seen = new Set<string>();
  const result: UniverseEntry[] = [];

  for (const entry of entries) {
    const symbol = entry.symbol.trim().toUpperCase();
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    result.push({ symbol, name: entry.name || symbol });
    if (result.length >= n) break;
  }

  return result;
}

export class UniverseRefresher {
  private current: MonitoredUniverse | null = null;
  private lastFailureAt: number | null = null;

  constructor(private readonly options: UniverseRefresherOptions) {}

  /**
   * Restore the universe persisted by a previous run
   */
  async load(): Promise<MonitoredUniverse | null> {
    const raw = await this.options.store.get(UNIVERSE_KEY);
    this.current = raw ? parseUniverse(raw) : null;
    if (this.current) {
      info(
        "Universe",
        `Restored ${this.current.entries.length} symbols (refreshed ${new Date(this.current.refreshedAt).toISOString()})`
      );
    }
    return this.current;
  }

  get universe(): MonitoredUniverse | null {
    return this.current;
  }

  isDue(now: number): boolean {
    if (this.lastFailureAt !== null && now - this.lastFailureAt < this.options.retryDelayMs) {
      return false;
    }
    return this.current === null || now - this.current.refreshedAt >= this.options.refreshIntervalMs;
  }

  nextRefreshAt(): number | null {
    if (!this.current) return null;
    return this.current.refreshedAt + this.options.refreshIntervalMs;
  }

  async refresh(now: number, signal?: AbortSignal): Promise<RefreshOutcome> {
    const previous = this.current ?? { entries: [], refreshedAt: 0 };

    if (!this.isDue(now)) {
      return { universe: previous, changed: false, added: [], removed: [] };
    }

    let entries: UniverseEntry[];
    try {
      entries = normalizeEntries(
        await this.options.provider.topSymbols(this.options.topN, signal),
        this.options.topN
      );
    } catch (err) {
      this.lastFailureAt = now;
      const attempts = err instanceof UniverseFetchError ? ` after ${err.attempts} attempts` : "";
      logError("Universe", `Refresh failed${attempts}, keeping ${previous.entries.length} symbols: ${describeError(err)}`);
      return { universe: previous, changed: false, added: [], removed: [] };
    }

    if (entries.length === 0) {
      this.lastFailureAt = now;
      warn("Universe", "Provider returned no symbols, keeping previous universe");
      return { universe: previous, changed: false, added: [], removed: [] };
    }

    const oldSymbols = new Set(previous.entries.map((e) => e.symbol));
    const newSymbols = new Set(entries.map((e) => e.symbol));
    const added = entries.map((e) => e.symbol).filter((s) => !oldSymbols.has(s));
    const removed = previous.entries.map((e) => e.symbol).filter((s) => !newSymbols.has(s));

    for (const symbol of removed) {
      await this.options.locks.run(symbol, async () => {
        await this.options.baselines.discard(symbol);
        await this.options.cooldowns.discard(symbol);
      });
    }

    const universe: MonitoredUniverse = { entries, refreshedAt: now };
    await this.options.store.set(UNIVERSE_KEY, JSON.stringify(universe));
    this.current = universe;
    this.lastFailureAt = null;

    info(
      "Universe",
      `Refreshed: ${entries.length} symbols (+${added.length} / -${removed.length})`,
      removed.length > 0 ? { removed } : undefined
    );

    return { universe, changed: true, added, removed };
  }
}
