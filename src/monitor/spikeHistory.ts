/**
 * Recent delivered spikes, newest first. Read by /status.
 */

import type { StateStore } from "../state/stateStore.js";
import type { SpikeRecord } from "./types.js";

const SPIKES_KEY = "spikes:recent";

const isNumberOrNull = (value: unknown) => value === null || typeof value === "number";

function isSpikeRecord(value: unknown): value is SpikeRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "symbol" in value &&
    "at" in value &&
    "reason" in value &&
    "pctChange" in value &&
    "zScore" in value &&
    "sources" in value &&
    typeof value.symbol === "string" &&
    typeof value.at === "number" &&
    typeof value.reason === "string" &&
    isNumberOrNull(value.pctChange) &&
    isNumberOrNull(value.zScore) &&
    Array.isArray(value.sources)
  );
}

function parseRecord(raw: string): SpikeRecord | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isSpikeRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export class SpikeHistory {
  constructor(private readonly store: StateStore, private readonly limit: number) {}

  async add(record: SpikeRecord): Promise<void> {
    await this.store.lpush(SPIKES_KEY, JSON.stringify(record));
    await this.store.ltrim(SPIKES_KEY, 0, this.limit - 1);
  }

  async recent(count: number = 10): Promise<SpikeRecord[]> {
    const raw = await this.store.lrange(SPIKES_KEY, 0, count - 1);
    return raw.map(parseRecord).filter((r): r is SpikeRecord => r !== null);
  }
}
