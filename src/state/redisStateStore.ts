import type { Redis } from "ioredis";
import type { ScoreBound, StateStore } from "./stateStore.js";

/**
 * StateStore backed by Redis
 */
export class RedisStateStore implements StateStore {
  constructor(private readonly redis: Redis) {}

  async connect(): Promise<void> {
    await this.redis.connect();
    await this.redis.ping();
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    await this.redis.zadd(key, score, member);
  }

  async zrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<string[]> {
    return this.redis.zrangebyscore(key, min, max);
  }

  async zremrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    return this.redis.zremrangebyscore(key, min, max);
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.redis.hget(key, field);
  }

  async hset(key: string, field: string, value: string): Promise<void> {
    await this.redis.hset(key, field, value);
  }

  async hdel(key: string, field: string): Promise<void> {
    await this.redis.hdel(key, field);
  }

  async lpush(key: string, value: string): Promise<void> {
    await this.redis.lpush(key, value);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.redis.ltrim(key, start, stop);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
