import { Redis } from "ioredis";
import { info, error as logError } from "./logger.js";
import type { RedisSettings } from "../config/monitorConfig.js";

export function createRedisClient(settings: RedisSettings): Redis {
  const redis = new Redis({
    host: settings.host,
    port: settings.port,
    db: settings.db,
    lazyConnect: true,
  });

  redis.on("error", (err: Error) => {
    logError("Redis", "Redis client error", err);
  });

  redis.on("connect", () => {
    info("Redis", `Connected to ${settings.host}:${settings.port}/${settings.db}`);
  });

  return redis;
}
