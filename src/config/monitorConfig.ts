/**
 * Monitor configuration
 *
 * Read from the environment (after dotenv has loaded .env). Invalid values are
 * fatal at startup.
 */

import { ConfigError } from "../utils/errors.js";

export const SUPPORTED_EXCHANGES = ["binance", "okx", "bybit"] as const;
export type ExchangeId = (typeof SUPPORTED_EXCHANGES)[number];

export type StateBackend = "redis" | "memory";

export interface RedisSettings {
  host: string;
  port: number;
  db: number;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
  commands: boolean;
}

export interface MonitorConfig {
  exchanges: ExchangeId[];
  windowMinutes: number;
  lookbackHours: number;
  pollSeconds: number;
  pctThreshold: number;
  zScoreThreshold: number;
  cooldownMinutes: number;
  maxConcurrency: number;
  requestTimeoutSeconds: number;
  topN: number;
  universeRefreshHours: number;
  universeRetryMinutes: number;
  minBaselineSamples: number;
  quoteAssets: string[];
  coingeckoBase: string;
  spikeHistoryLimit: number;
  stateBackend: StateBackend;
  redis: RedisSettings;
  /** null = dry run, alerts go to the log */
  telegram: TelegramSettings | null;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readFloat(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function readList(env: Env, name: string, fallback: string): string[] {
  return (env[name] ?? fallback)
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isExchangeId(value: string): value is ExchangeId {
  return (SUPPORTED_EXCHANGES as readonly string[]).includes(value);
}

function readExchanges(env: Env): ExchangeId[] {
  const ids = readList(env, "EXCHANGES", SUPPORTED_EXCHANGES.join(",")).map((id) => id.toLowerCase());
  if (ids.length === 0) {
    throw new ConfigError("EXCHANGES must name at least one exchange");
  }

  const exchanges: ExchangeId[] = [];
  for (const id of ids) {
    if (!isExchangeId(id)) {
      throw new ConfigError(`Unsupported exchange "${id}" (supported: ${SUPPORTED_EXCHANGES.join(", ")})`);
    }
    if (!exchanges.includes(id)) exchanges.push(id);
  }
  return exchanges;
}

function readStateBackend(env: Env): StateBackend {
  const raw = (env.STATE_BACKEND || "redis").trim().toLowerCase();
  if (raw !== "redis" && raw !== "memory") {
    throw new ConfigError(`STATE_BACKEND must be "redis" or "memory", got "${raw}"`);
  }
  return raw;
}

function readTelegram(env: Env): TelegramSettings | null {
  const botToken = env.TELEGRAM_BOT_TOKEN?.trim();
  const chatId = env.TELEGRAM_CHAT_ID?.trim();
  if (!botToken || !chatId || chatId === "0") {
    return null;
  }
  return {
    botToken,
    chatId,
    commands: (env.TELEGRAM_COMMANDS || "true").toLowerCase() !== "false",
  };
}

/**
 * Build the monitor configuration from environment variables
 */
export function loadConfig(env: Env = process.env): MonitorConfig {
  const windowMinutes = readInt(env, "WINDOW_MIN", 5, 1);
  const lookbackHours = readInt(env, "LOOKBACK_HOURS", 24, 1);

  if (lookbackHours * 60 < windowMinutes * 2) {
    throw new ConfigError(
      `LOOKBACK_HOURS (${lookbackHours}h) must cover at least two ${windowMinutes}m windows`
    );
  }

  const quoteAssets = readList(env, "QUOTE_ASSETS", "USDT,USDC").map((q) => q.toUpperCase());
  if (quoteAssets.length === 0) {
    throw new ConfigError("QUOTE_ASSETS must name at least one quote asset");
  }

  return {
    exchanges: readExchanges(env),
    windowMinutes,
    lookbackHours,
    pollSeconds: readInt(env, "POLL_SECONDS", 60, 1),
    pctThreshold: readFloat(env, "PCT_THRESHOLD", 200),
    zScoreThreshold: readFloat(env, "ZSCORE_THRESHOLD", 3.0),
    cooldownMinutes: readInt(env, "COOLDOWN_MIN", 30, 0),
    maxConcurrency: readInt(env, "MAX_CONCURRENCY", 6, 1),
    requestTimeoutSeconds: readInt(env, "REQUEST_TIMEOUT", 15, 1),
    topN: readInt(env, "TOP_N", 50, 1),
    universeRefreshHours: readFloat(env, "UNIVERSE_REFRESH_HOURS", 6),
    universeRetryMinutes: readInt(env, "UNIVERSE_RETRY_MIN", 5, 1),
    minBaselineSamples: readInt(env, "MIN_BASELINE_SAMPLES", 5, 2),
    quoteAssets,
    coingeckoBase: (env.COINGECKO_BASE || "https://api.coingecko.com/api/v3").replace(/\/+$/, ""),
    spikeHistoryLimit: readInt(env, "SPIKE_HISTORY_LIMIT", 100, 1),
    stateBackend: readStateBackend(env),
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: readInt(env, "REDIS_PORT", 6379, 1),
      db: readInt(env, "REDIS_DB", 0, 0),
    },
    telegram: readTelegram(env),
  };
}

export const minutesToMs = (minutes: number): number => minutes * 60 * 1000;
export const hoursToMs = (hours: number): number => hours * 60 * 60 * 1000;
