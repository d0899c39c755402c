/**
 * Error taxonomy for the monitor.
 *
 * Only ConfigError is fatal; everything else is caught per symbol
 * (or per refresh) and logged.
 */

export class MonitorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type SourceFailureReason = "timeout" | "symbol_absent" | "candle_missing" | "error";

/**
 * One exchange failed for one symbol/window. Excluded from the aggregate.
 */
export class SourceUnavailableError extends MonitorError {
  constructor(
    readonly source: string,
    readonly symbol: string,
    readonly reason: SourceFailureReason,
    detail?: string
  ) {
    super(`${source} unavailable for ${symbol} (${reason}${detail ? `: ${detail}` : ""})`);
  }
}

/**
 * Every source failed for a symbol/window. The symbol is skipped this cycle.
 */
export class NoSourceAvailableError extends MonitorError {
  constructor(readonly symbol: string, readonly windowStart: number, readonly failed: string[]) {
    super(`No source returned volume for ${symbol} @ ${new Date(windowStart).toISOString()}`);
  }
}

/**
 * Baseline has too few samples to evaluate.
 */
export class NotEnoughDataError extends MonitorError {
  constructor(readonly symbol: string, readonly count: number, readonly required: number) {
    super(`Baseline for ${symbol} has ${count}/${required} samples`);
  }
}

/**
 * Capitalization provider unreachable. The previous universe is kept.
 */
export class UniverseFetchError extends MonitorError {
  constructor(message: string, readonly attempts: number) {
    super(message);
  }
}

/**
 * Alert delivery failed. The cooldown stays committed.
 */
export class NotifyError extends MonitorError {
  constructor(readonly symbol: string, detail: string) {
    super(`Failed to deliver alert for ${symbol}: ${detail}`);
  }
}

export class ConfigError extends MonitorError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
