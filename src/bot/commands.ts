/**
 * Telegram commands
 *
 * /status - last delivered spikes
 * /top    - currently monitored universe
 */

import type TelegramBot from "node-telegram-bot-api";
import { info, error as logError } from "../utils/logger.js";
import type { SpikeHistory } from "../monitor/spikeHistory.js";
import type { UniverseRefresher } from "../monitor/universeRefresher.js";
import type { SpikeRecord, MonitoredUniverse } from "../monitor/types.js";

export interface CommandDeps {
  history: SpikeHistory;
  universe: UniverseRefresher;
}

export function formatStatus(spikes: SpikeRecord[]): string {
  if (spikes.length === 0) {
    return "No spikes yet. Monitoring is running ✅";
  }

  const lines = ["Latest spikes:"];
  for (const spike of spikes) {
    const pct = spike.pctChange === null ? "n/a" : `+${spike.pctChange.toFixed(0)}%`;
    const z = spike.zScore === null ? "n/a" : spike.zScore.toFixed(2);
    const time = new Date(spike.at).toISOString().slice(11, 19);
    lines.push(`- ${spike.symbol}: ${pct} (z=${z}) at ${time} UTC`);
  }
  return lines.join("\n");
}

export function formatTop(universe: MonitoredUniverse | null): string {
  if (!universe || universe.entries.length === 0) {
    return "The monitored universe is empty (waiting for the first refresh).";
  }
  return `Top-${universe.entries.length} by market cap (CoinGecko):\n` + universe.entries.map((e) => e.symbol).join(", ");
}

export function registerCommands(bot: TelegramBot, deps: CommandDeps): void {
  bot.onText(/^\/status\b/, async (msg) => {
    try {
      const spikes = await deps.history.recent(10);
      await bot.sendMessage(msg.chat.id, formatStatus(spikes));
    } catch (err) {
      logError("Commands", "/status failed", err);
    }
  });

  bot.onText(/^\/top\b/, async (msg) => {
    try {
      await bot.sendMessage(msg.chat.id, formatTop(deps.universe.universe));
    } catch (err) {
      logError("Commands", "/top failed", err);
    }
  });

  bot.on("polling_error", (err: Error) => {
    logError("Commands", "Telegram polling error", err);
  });

  info("Commands", "Registered /status and /top");
}
