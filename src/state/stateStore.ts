/**
 * Key-value durability used by the baseline, cooldown, universe and spike
 * history stores. Mirrors the subset of Redis commands the monitor needs.
 *
 * Implementations must give read-after-write consistency within one process.
 */
export type ScoreBound = number | "-inf" | "+inf";

export interface StateStore {
  /** Sorted set insert; an existing member gets its score updated */
  zadd(key: string, score: number, member: string): Promise<void>;
  /** Members with min <= score <= max, ascending by score */
  zrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<string[]>;
  zremrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<number>;

  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<void>;
  hdel(key: string, field: string): Promise<void>;

  lpush(key: string, value: string): Promise<void>;
  ltrim(key: string, start: number, stop: number): Promise<void>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;

  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  del(key: string): Promise<void>;

  close(): Promise<void>;
}
