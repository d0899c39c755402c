/**
 * In-Memory State Store
 *
 * Simulates the Redis operations the monitor uses. Backs STATE_BACKEND=memory
 * (state is lost on restart) and the test suite.
 */

import type { ScoreBound, StateStore } from "./stateStore.js";

interface ScoredMember {
  score: number;
  member: string;
}

function toScore(bound: ScoreBound): number {
  if (bound === "-inf") return -Infinity;
  if (bound === "+inf") return Infinity;
  return bound;
}

/**
 * Redis-style inclusive range, negative indexes count from the end
 */
function redisSlice<T>(list: T[], start: number, stop: number): T[] {
  const from = start < 0 ? Math.max(list.length + start, 0) : start;
  const to = stop < 0 ? list.length + stop : stop;
  if (from > to) return [];
  return list.slice(from, to + 1);
}

export class MemoryStateStore implements StateStore {
  private strings: Map<string, string> = new Map();
  private lists: Map<string, string[]> = new Map();
  private hashes: Map<string, Map<string, string>> = new Map();
  private sortedSets: Map<string, ScoredMember[]> = new Map();

  async zadd(key: string, score: number, member: string): Promise<void> {
    let set = this.sortedSets.get(key);
    if (!set) {
      set = [];
      this.sortedSets.set(key, set);
    }

    // Remove existing entry with same member
    const existingIndex = set.findIndex((e) => e.member === member);
    if (existingIndex >= 0) {
      set.splice(existingIndex, 1);
    }

    set.push({ score, member });
    set.sort((a, b) => a.score - b.score || a.member.localeCompare(b.member));
  }

  async zrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<string[]> {
    const set = this.sortedSets.get(key) || [];
    const minScore = toScore(min);
    const maxScore = toScore(max);

    return set.filter((e) => e.score >= minScore && e.score <= maxScore).map((e) => e.member);
  }

  async zremrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    const set = this.sortedSets.get(key);
    if (!set) return 0;

    const minScore = toScore(min);
    const maxScore = toScore(max);
    const filtered = set.filter((e) => !(e.score >= minScore && e.score <= maxScore));
    this.sortedSets.set(key, filtered);

    return set.length - filtered.length;
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string): Promise<void> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    hash.set(field, value);
  }

  async hdel(key: string, field: string): Promise<void> {
    this.hashes.get(key)?.delete(field);
  }

  async lpush(key: string, value: string): Promise<void> {
    const list = this.lists.get(key) || [];
    list.unshift(value);
    this.lists.set(key, list);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const list = this.lists.get(key) || [];
    this.lists.set(key, redisSlice(list, start, stop));
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return redisSlice(this.lists.get(key) || [], start, stop);
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.strings.set(key, value);
  }

  async del(key: string): Promise<void> {
    this.strings.delete(key);
    this.lists.delete(key);
    this.hashes.delete(key);
    this.sortedSets.delete(key);
  }

  async close(): Promise<void> {
    this.clear();
  }

  /**
   * Clear all data (for resetting between tests)
   */
  clear(): void {
    this.strings.clear();
    this.lists.clear();
    this.hashes.clear();
    this.sortedSets.clear();
  }
}
