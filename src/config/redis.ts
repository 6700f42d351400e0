import Redis from "ioredis";
import { AppConfig } from "./env";
import { logger } from "../utils/logger";

export function createRedisClient(config: AppConfig): Redis {
  const redis = new Redis(config.REDIS_URL, {
    // A slow store must not hold requests; the limiter fails open instead.
    commandTimeout: config.RATE_LIMIT_TIMEOUT_MS,
    maxRetriesPerRequest: 1,
  });

  redis.on("error", (err: Error) => {
    logger.error({ err }, "Redis connection error");
  });

  return redis;
}
