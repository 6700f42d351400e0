import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createRedisClient } from "./config/redis";
import { RedisCountingStore } from "./limiter/redisCountingStore";
import { createLimiterConfig } from "./types/policy";
import { logger } from "./utils/logger";

const SHUTDOWN_TIMEOUT_MS = 5000;

function main() {
  const config = loadConfig();
  logger.level = config.NODE_ENV === "test" ? "silent" : config.LOG_LEVEL;

  const redis = createRedisClient(config);
  const limiter = createLimiterConfig({
    store: new RedisCountingStore(redis),
    keyPrefix: config.RATE_LIMIT_PREFIX,
    limit: config.RATE_LIMIT_MAX,
    windowSeconds: config.RATE_LIMIT_WINDOW_SECONDS,
  });

  const app = createApp({
    limiter,
    limiterOptions: { timeoutMs: config.RATE_LIMIT_TIMEOUT_MS },
    authToken: config.AUTH_TOKEN,
    trustProxy: config.TRUST_PROXY,
  });

  const server = app.listen(config.PORT, () => {
    logger.info(
      {
        port: config.PORT,
        limit: limiter.limit,
        windowSeconds: limiter.windowSeconds,
      },
      "Server listening"
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      redis.quit().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "Redis did not close cleanly");
          process.exit(1);
        }
      );
    });
    setTimeout(() => {
      logger.error("Forcing shutdown after timeout");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err) {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
}
