/**
 * Telegram Notifier
 *
 * Sends volume spike alerts to a Telegram chat. Without credentials it runs
 * in dry-run mode and writes the message to the log instead.
 */

import TelegramBot from "node-telegram-bot-api";
import { info, warn, error as logError } from "./logger.js";
import { NotifyError, describeError } from "./errors.js";
import type { TelegramSettings } from "../config/monitorConfig.js";
import type { AggregateResult, Notifier, SignalVerdict, UniverseEntry } from "../monitor/types.js";

export interface MessageSender {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

/**
 * Create the bot. Polling is only needed for /status and /top.
 */
export function initTelegram(settings: TelegramSettings | null): TelegramBot | null {
  if (!settings) {
    warn("TelegramNotifier", "Telegram credentials not configured. Running in DRY-RUN mode (alerts go to the log).");
    return null;
  }

  const bot = new TelegramBot(settings.botToken, { polling: settings.commands });
  info("TelegramNotifier", `Telegram bot initialized (commands ${settings.commands ? "on" : "off"})`);
  return bot;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatVolume(value: number): string {
  return Math.round(value).toLocaleString("en-US");
}

export function formatUtc(ts: number): string {
  return `${new Date(ts).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Format a spike alert for Telegram (HTML parse mode)
 */
export function formatSpikeMessage(
  entry: UniverseEntry,
  verdict: SignalVerdict,
  aggregate: AggregateResult,
  windowMinutes: number
): string {
  const pct = verdict.pctChange === null ? "n/a" : `${verdict.pctChange >= 0 ? "+" : ""}${verdict.pctChange.toFixed(0)}%`;
  const z = verdict.zScore === null ? "n/a" : verdict.zScore.toFixed(2);
  const exchanges = aggregate.sources.length > 0 ? aggregate.sources.join(", ") : "—";

  return [
    `⚡️ Abnormal volume: <b>${escapeHtml(entry.name)} (${escapeHtml(entry.symbol)})</b>`,
    `Window: ${windowMinutes} min | Exchanges: ${exchanges}`,
    `Current volume: ${formatVolume(verdict.observedVolume)}`,
    `Baseline: mean=${formatVolume(verdict.baselineMean)}, σ=${formatVolume(verdict.baselineStd)}`,
    `Δ vs baseline: <b>${pct}</b> | z=${z} | rule: ${verdict.reason}`,
    `Window start: ${formatUtc(verdict.windowStart)}`,
  ].join("\n");
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly sender: MessageSender | null,
    private readonly chatId: string | null,
    private readonly windowMinutes: number
  ) {}

  get enabled(): boolean {
    return this.sender !== null && this.chatId !== null;
  }

  async send(entry: UniverseEntry, verdict: SignalVerdict, aggregate: AggregateResult): Promise<void> {
    const message = formatSpikeMessage(entry, verdict, aggregate, this.windowMinutes);
    await this.sendText(entry.symbol, message);
    info("TelegramNotifier", `Sent spike notification for ${entry.symbol}`);
  }

  /**
   * Tell the chat a poll cycle crashed. Delivery failures are logged only.
   */
  async reportCycleError(err: unknown): Promise<void> {
    const message = `⚠️ Volume monitor cycle error: ${escapeHtml(describeError(err))}`;
    try {
      await this.sendText("cycle", message);
    } catch (notifyErr) {
      logError("TelegramNotifier", "Failed to report cycle error", notifyErr);
    }
  }

  async sendText(context: string, message: string): Promise<void> {
    if (!this.sender || !this.chatId) {
      info("TelegramNotifier", `[DRY-RUN] ${message}`);
      return;
    }

    try {
      await this.sender.sendMessage(this.chatId, message, {
        parse_mode: "HTML",
        disable_web_page_preview: true,
      });
    } catch (err) {
      throw new NotifyError(context, describeError(err));
    }
  }
}
