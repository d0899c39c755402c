/**
 * Cooldown Tracker
 *
 * Per-symbol idle/cooled state. A symbol is cooled while less than the
 * cooldown interval has passed since its last delivered alert; going back to
 * idle is a timestamp comparison, not a timer.
 */

import type { StateStore } from "../state/stateStore.js";
import type { MarketSymbol } from "./types.js";

export type CooldownState = "idle" | "cooled";

const COOLDOWN_KEY = "cooldown:last_alert";

export class CooldownTracker {
  constructor(private readonly store: StateStore, private readonly cooldownMs: number) {}

  async lastAlertAt(symbol: MarketSymbol): Promise<number | null> {
    const raw = await this.store.hget(COOLDOWN_KEY, symbol);
    if (raw === null) return null;
    const ts = Number(raw);
    return Number.isFinite(ts) ? ts : null;
  }

  async state(symbol: MarketSymbol, now: number): Promise<CooldownState> {
    const last = await this.lastAlertAt(symbol);
    return last !== null && now - last < this.cooldownMs ? "cooled" : "idle";
  }

  async mayAlert(symbol: MarketSymbol, now: number): Promise<boolean> {
    return (await this.state(symbol, now)) === "idle";
  }

  /**
   * Enter (or restart) the cooldown. Only called once an alert is handed off.
   */
  async recordAlert(symbol: MarketSymbol, now: number): Promise<void> {
    await this.store.hset(COOLDOWN_KEY, symbol, String(now));
  }

  async discard(symbol: MarketSymbol): Promise<void> {
    await this.store.hdel(COOLDOWN_KEY, symbol);
  }
}
