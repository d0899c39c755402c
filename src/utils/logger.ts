import fs from "fs";
import path from "path";

/**
 * Logging utility with file persistence
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_RANK: Record<LogLevel | "SILENT", number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

export interface SpikeLogEntry {
  timestamp: string;
  symbol: string;
  windowStart: string;
  reason: string;
  observed: number;
  mean: number;
  std: number;
  pctChange: number | null;
  zScore: number | null;
  sources: string[];
}

export interface CycleSummaryLog {
  symbols: number;
  recorded: number;
  evaluated: number;
  alerted: number;
  suppressed: number;
  noSource: number;
  notEnoughData: number;
  failed: number;
  durationMs: number;
}

function logDir(): string {
  return process.env.LOG_DIR || path.join(process.cwd(), "logs");
}

function fileLoggingEnabled(): boolean {
  return (process.env.LOG_TO_FILE || "true").toLowerCase() !== "false";
}

function isThreshold(value: string): value is keyof typeof LEVEL_RANK {
  return value in LEVEL_RANK;
}

function minimumLevel(): number {
  const configured = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return isThreshold(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.INFO;
}

/**
 * Daily file under the log directory, e.g. app-2026-01-31.log
 */
function dailyFile(prefix: string, extension: string): string {
  const day = new Date().toISOString().split("T")[0];
  return path.join(logDir(), `${prefix}-${day}.${extension}`);
}

/**
 * Write log entry to file
 */
function writeToFile(filePath: string, content: string): void {
  if (!fileLoggingEnabled()) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.appendFileSync(filePath, content + "\n", "utf8");
  } catch (err) {
    console.error(`Failed to write to ${filePath}:`, err);
  }
}

/**
 * Format timestamp
 */
function getTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Errors stringify to {} by default; keep their name and message.
 */
export function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  return data;
}

/**
 * Main log function
 */
export function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (LEVEL_RANK[level] < minimumLevel()) {
    return;
  }

  const entry: LogEntry = {
    timestamp: getTimestamp(),
    level,
    module,
    message,
    data: serializeData(data),
  };

  // Console output with color
  const colors: Record<LogLevel, string> = {
    INFO: "\x1b[36m",    // Cyan
    WARN: "\x1b[33m",    // Yellow
    ERROR: "\x1b[31m",   // Red
    DEBUG: "\x1b[90m",   // Gray
  };
  const reset = "\x1b[0m";
  const color = colors[level];

  const consoleMsg = `${color}[${entry.timestamp}] [${level}] [${module}]${reset} ${message}`;
  console.log(consoleMsg);
  if (entry.data !== undefined) {
    console.log(entry.data);
  }

  writeToFile(dailyFile("app", "log"), JSON.stringify(entry));
}

/**
 * Log a delivered volume spike
 */
export function logSpikeSignal(entry: Omit<SpikeLogEntry, "timestamp">): void {
  const record: SpikeLogEntry = { timestamp: getTimestamp(), ...entry };

  writeToFile(dailyFile("signals", "jsonl"), JSON.stringify(record));

  const pct = entry.pctChange === null ? "n/a" : `${entry.pctChange.toFixed(0)}%`;
  const z = entry.zScore === null ? "n/a" : entry.zScore.toFixed(2);
  log(
    "INFO",
    "SpikeSignal",
    `${entry.symbol} ${entry.reason} vol=${entry.observed.toFixed(0)} mean=${entry.mean.toFixed(0)} Δ=${pct} z=${z}`
  );
}

/**
 * Log cycle summary
 */
export function logCycleSummary(summary: CycleSummaryLog): void {
  log(
    "INFO",
    "CycleSummary",
    `Symbols: ${summary.symbols}, Recorded: ${summary.recorded}, Evaluated: ${summary.evaluated}, Alerts: ${summary.alerted} (${summary.durationMs}ms)`,
    {
      suppressed: summary.suppressed,
      noSource: summary.noSource,
      notEnoughData: summary.notEnoughData,
      failed: summary.failed,
    }
  );
}

/**
 * Export shorthand functions
 */
export const info = (module: string, message: string, data?: unknown) => log("INFO", module, message, data);
export const warn = (module: string, message: string, data?: unknown) => log("WARN", module, message, data);
export const error = (module: string, message: string, data?: unknown) => log("ERROR", module, message, data);
export const debug = (module: string, message: string, data?: unknown) => log("DEBUG", module, message, data);
