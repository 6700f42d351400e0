import express from "express";
import { rateLimit } from "./middleware/rateLimit.middleware";
import { authenticate } from "./middleware/auth.middleware";
import { LimiterConfig } from "./types/policy";
import { SlidingWindowOptions } from "./limiter/slidingWindow";
import { errorHandler } from "./errors";
import { getMetrics } from "./utils/metrics";

export interface AppOptions {
  limiter: Readonly<LimiterConfig>;
  limiterOptions?: SlidingWindowOptions;
  authToken?: string;
  trustProxy?: boolean;
}

export function createApp(options: AppOptions): express.Application {
  const app = express();

  app.set("trust proxy", options.trustProxy ?? false);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/metrics", (_req, res) => {
    res.json(getMetrics());
  });

  if (options.authToken) {
    app.use(authenticate(options.authToken));
  }

  app.use("/api", rateLimit(options.limiter, options.limiterOptions));

  app.get("/api/ping", (req, res) => {
    res.json({ message: "pong", userId: req.userId ?? null });
  });

  app.use(errorHandler);

  return app;
}
