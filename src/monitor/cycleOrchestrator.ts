/**
 * Cycle Orchestrator
 *
 * One poll iteration:
 *   refresh universe (if due) -> per symbol: fetch + aggregate -> record sample
 *   -> baseline -> evaluate -> cooldown -> notify
 *
 * Symbols are processed independently with bounded concurrency; a failure in
 * one symbol is counted and logged but never aborts the cycle.
 */

import { debug, info, warn, error as logError, logCycleSummary, logSpikeSignal } from "../utils/logger.js";
import { NoSourceAvailableError, NotEnoughDataError, describeError } from "../utils/errors.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import type { KeyedLock } from "../utils/keyedLock.js";
import type { BaselineStore } from "./baselineStore.js";
import type { CooldownTracker } from "./cooldownTracker.js";
import type { SpikeHistory } from "./spikeHistory.js";
import type { UniverseRefresher } from "./universeRefresher.js";
import { aggregateVolumes, collectReadings } from "./volumeAggregator.js";
import { buildVerdict, type SignalThresholds } from "./signalEvaluator.js";
import type { Clock, MarketDataSource, Notifier, UniverseEntry } from "./types.js";

export type SymbolOutcome =
  | "alerted"
  | "suppressed"
  | "quiet"
  | "already_recorded"
  | "no_source"
  | "not_enough_data"
  | "aborted"
  | "failed";

export interface CycleSummary {
  windowStart: number;
  symbols: number;
  recorded: number;
  evaluated: number;
  alerted: number;
  suppressed: number;
  noSource: number;
  notEnoughData: number;
  alreadyRecorded: number;
  failed: number;
  durationMs: number;
}

export interface CycleOrchestratorOptions {
  universe: UniverseRefresher;
  sources: readonly MarketDataSource[];
  baselines: BaselineStore;
  cooldowns: CooldownTracker;
  history: SpikeHistory;
  notifier: Notifier;
  locks: KeyedLock;
  clock: Clock;
  windowMs: number;
  thresholds: SignalThresholds;
  maxConcurrency: number;
  requestTimeoutMs: number;
}

/**
 * Start of the most recently closed window
 */
export function lastClosedWindowStart(now: number, windowMs: number): number {
  return Math.floor(now / windowMs) * windowMs - windowMs;
}

export class CycleOrchestrator {
  private lastSummaryValue: CycleSummary | null = null;
  private alertsSinceStart = 0;

  constructor(private readonly options: CycleOrchestratorOptions) {}

  get lastSummary(): CycleSummary | null {
    return this.lastSummaryValue;
  }

  get totalAlerts(): number {
    return this.alertsSinceStart;
  }

  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const startedAt = this.options.clock.now();
    const { universe } = await this.options.universe.refresh(startedAt, signal);
    const windowStart = lastClosedWindowStart(startedAt, this.options.windowMs);

    const outcomes = await mapWithConcurrency(universe.entries, this.options.maxConcurrency, (entry) =>
      this.processSymbol(entry, windowStart, signal)
    );

    const count = (...kinds: SymbolOutcome[]) => outcomes.filter((o) => kinds.includes(o)).length;
    const summary: CycleSummary = {
      windowStart,
      symbols: universe.entries.length,
      recorded: count("alerted", "suppressed", "quiet", "not_enough_data"),
      evaluated: count("alerted", "suppressed", "quiet"),
      alerted: count("alerted"),
      suppressed: count("suppressed"),
      noSource: count("no_source"),
      notEnoughData: count("not_enough_data"),
      alreadyRecorded: count("already_recorded"),
      failed: count("failed"),
      durationMs: this.options.clock.now() - startedAt,
    };

    this.lastSummaryValue = summary;
    this.alertsSinceStart += summary.alerted;
    logCycleSummary(summary);
    return summary;
  }

  /**
   * Fetch, record and evaluate one symbol. Never throws.
   */
  async processSymbol(entry: UniverseEntry, windowStart: number, signal?: AbortSignal): Promise<SymbolOutcome> {
    const { symbol } = entry;
    if (signal?.aborted) return "aborted";

    try {
      return await this.options.locks.run<SymbolOutcome>(symbol, async () => {
        const { baselines } = this.options;

        if (await baselines.hasSample(symbol, windowStart)) {
          return "already_recorded";
        }

        const readings = await collectReadings(this.options.sources, symbol, windowStart, {
          timeoutMs: this.options.requestTimeoutMs,
          signal,
        });
        // Abandon partial work on shutdown; nothing has been written yet
        if (signal?.aborted) return "aborted";

        for (const [sourceId, reading] of readings) {
          if (!reading.ok) debug("Cycle", `${symbol}: ${sourceId} excluded (${reading.error.reason})`);
        }

        const aggregate = aggregateVolumes(symbol, windowStart, readings);
        await baselines.record(symbol, windowStart, aggregate.volume);

        const baseline = await baselines.baseline(symbol, windowStart);
        if (baseline.mean <= 0) {
          return "not_enough_data";
        }

        const verdict = buildVerdict(symbol, windowStart, aggregate.volume, baseline, this.options.thresholds);
        if (!verdict.triggered) {
          return "quiet";
        }

        const now = this.options.clock.now();
        if (!(await this.options.cooldowns.mayAlert(symbol, now))) {
          info("Cycle", `${symbol} ${verdict.reason} suppressed (cooldown)`);
          return "suppressed";
        }

        // Handed to the notifier = sent. Delivery failure does not undo the cooldown.
        const delivery = this.options.notifier.send(entry, verdict, aggregate).then(
          () => true,
          (err: unknown) => {
            logError("Cycle", `NotifyFailure for ${symbol}: ${describeError(err)}`);
            return false;
          }
        );
        await this.options.cooldowns.recordAlert(symbol, now);

        logSpikeSignal({
          symbol,
          windowStart: new Date(windowStart).toISOString(),
          reason: verdict.reason,
          observed: verdict.observedVolume,
          mean: verdict.baselineMean,
          std: verdict.baselineStd,
          pctChange: verdict.pctChange,
          zScore: verdict.zScore,
          sources: aggregate.sources,
        });
        await this.options.history.add({
          at: now,
          symbol,
          name: entry.name,
          reason: verdict.reason,
          observed: verdict.observedVolume,
          mean: verdict.baselineMean,
          std: verdict.baselineStd,
          pctChange: verdict.pctChange,
          zScore: verdict.zScore,
          sources: aggregate.sources,
        });

        await delivery;
        return "alerted";
      });
    } catch (err) {
      if (err instanceof NotEnoughDataError) {
        debug("Cycle", err.message);
        return "not_enough_data";
      }
      if (err instanceof NoSourceAvailableError) {
        warn("Cycle", `${err.message} (failed: ${err.failed.join(", ") || "none"})`);
        return "no_source";
      }
      logError("Cycle", `Error processing ${symbol}`, err);
      return "failed";
    }
  }
}
