import "dotenv/config";
import type TelegramBot from "node-telegram-bot-api";
import type { ScheduledTask } from "node-cron";
import { hoursToMs, loadConfig, minutesToMs, type MonitorConfig } from "./config/monitorConfig.js";
import { info, warn, error } from "./utils/logger.js";
import { ConfigError } from "./utils/errors.js";
import { KeyedLock } from "./utils/keyedLock.js";
import { createRedisClient } from "./utils/redisClient.js";
import { initTelegram, TelegramNotifier } from "./utils/telegramNotifier.js";
import { MemoryStateStore } from "./state/memoryStateStore.js";
import { RedisStateStore } from "./state/redisStateStore.js";
import type { StateStore } from "./state/stateStore.js";
import { BaselineStore } from "./monitor/baselineStore.js";
import { CooldownTracker } from "./monitor/cooldownTracker.js";
import { CycleOrchestrator } from "./monitor/cycleOrchestrator.js";
import { PollScheduler } from "./monitor/pollScheduler.js";
import { SpikeHistory } from "./monitor/spikeHistory.js";
import { UniverseRefresher } from "./monitor/universeRefresher.js";
import { monotonicClock, systemClock } from "./monitor/types.js";
import { createSources } from "./sources/index.js";
import { createHttpClient } from "./sources/exchangeSource.js";
import { CoinGeckoProvider } from "./market/coingeckoProvider.js";
import { registerCommands } from "./bot/commands.js";
import { startStatusReport } from "./cron/statusReport.js";

interface Runtime {
  scheduler: PollScheduler;
  statusTask: ScheduledTask;
  bot: TelegramBot | null;
  store: StateStore;
}

let runtime: Runtime | null = null;

async function openStateStore(config: MonitorConfig): Promise<StateStore> {
  if (config.stateBackend === "memory") {
    warn("Main", "STATE_BACKEND=memory: baselines and cooldowns are lost on restart");
    return new MemoryStateStore();
  }

  const store = new RedisStateStore(createRedisClient(config.redis));
  await store.connect();
  return store;
}

/**
 * Main startup sequence
 */
async function start(): Promise<void> {
  console.log("=".repeat(70));
  console.log("VOLUME SPIKE MONITOR");
  console.log("=".repeat(70));

  const config = loadConfig();
  const sources = createSources(config);
  const store = await openStateStore(config);

  const bot = initTelegram(config.telegram);
  const notifier = new TelegramNotifier(bot, config.telegram?.chatId ?? null, config.windowMinutes);

  const locks = new KeyedLock();
  const baselines = new BaselineStore(store, {
    lookbackMs: hoursToMs(config.lookbackHours),
    minSamples: config.minBaselineSamples,
  });
  const cooldowns = new CooldownTracker(store, minutesToMs(config.cooldownMinutes));
  const history = new SpikeHistory(store, config.spikeHistoryLimit);

  const universe = new UniverseRefresher({
    provider: new CoinGeckoProvider({
      http: createHttpClient(config.requestTimeoutSeconds * 1000),
      baseUrl: config.coingeckoBase,
    }),
    store,
    baselines,
    cooldowns,
    locks,
    topN: config.topN,
    refreshIntervalMs: hoursToMs(config.universeRefreshHours),
    retryDelayMs: minutesToMs(config.universeRetryMinutes),
  });
  await universe.load();

  const orchestrator = new CycleOrchestrator({
    universe,
    sources,
    baselines,
    cooldowns,
    history,
    notifier,
    locks,
    clock: systemClock,
    windowMs: minutesToMs(config.windowMinutes),
    thresholds: { pctThreshold: config.pctThreshold, zThreshold: config.zScoreThreshold },
    maxConcurrency: config.maxConcurrency,
    requestTimeoutMs: config.requestTimeoutSeconds * 1000,
  });

  if (bot && config.telegram?.commands) {
    registerCommands(bot, { history, universe });
  }

  const scheduler = new PollScheduler(
    (signal) => orchestrator.runCycle(signal),
    config.pollSeconds * 1000,
    monotonicClock,
    (err) => notifier.reportCycleError(err)
  );

  const statusTask = startStatusReport(() => ({
    now: systemClock.now(),
    universeSize: universe.universe?.entries.length ?? 0,
    lastCycle: orchestrator.lastSummary,
    totalAlerts: orchestrator.totalAlerts,
    completedCycles: scheduler.completedCycles,
    nextUniverseRefresh: universe.nextRefreshAt(),
  }));

  runtime = { scheduler, statusTask, bot, store };
  scheduler.start();

  info(
    "Main",
    `Monitoring top-${config.topN} on ${config.exchanges.join(", ")} | window ${config.windowMinutes}m, lookback ${config.lookbackHours}h, ` +
      `PCT>${config.pctThreshold}% or z>=${config.zScoreThreshold}, cooldown ${config.cooldownMinutes}m`
  );
}

/**
 * Graceful shutdown
 */
async function shutdown(): Promise<void> {
  console.log("\nShutting down Volume Spike Monitor...");

  if (runtime) {
    const { scheduler, statusTask, bot, store } = runtime;
    runtime = null;
    statusTask.stop();
    await scheduler.stop();
    if (bot?.isPolling()) {
      await bot.stopPolling();
    }
    await store.close();
  }

  console.log("✓ Shutdown complete");
  process.exit(0);
}

function handleSignal(): void {
  shutdown().catch((err) => {
    error("Main", "Shutdown failed", err);
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

process.on("unhandledRejection", (reason) => {
  error("Main", "Unhandled promise rejection", reason);
});

start().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error("Startup failed:", err);
  }
  process.exit(1);
});
