import { Request, Response, NextFunction } from "express";
import { LimiterConfig } from "../types/policy";
import { RateLimitResult } from "../types/decision";
import {
  SlidingWindowLimiter,
  SlidingWindowOptions,
} from "../limiter/slidingWindow";
import { getRateLimitKey } from "../utils/identifier";
import { TooManyRequestsError } from "../errors";
import { logger } from "../utils/logger";
import { recordOutcome } from "../utils/metrics";

export function rateLimit(
  config: Readonly<LimiterConfig>,
  options: SlidingWindowOptions = {}
) {
  const limiter = new SlidingWindowLimiter(config, options);

  return async (req: Request, res: Response, next: NextFunction) => {
    const key = getRateLimitKey(req, config.keyPrefix);

    let result: RateLimitResult;
    try {
      result = await limiter.consume(key);
    } catch (err) {
      // fail-open: no headers, no retry
      logger.warn({ err, key }, "Rate limiter store unavailable, allowing request");
      recordOutcome("failedOpen");
      next();
      return;
    }

    setHeaders(res, result);

    if (!result.allowed) {
      recordOutcome("blocked");
      logger.info(
        { key, count: result.count, limit: result.limit },
        "Rate limit exceeded"
      );
      next(new TooManyRequestsError());
      return;
    }

    recordOutcome("allowed");
    next();
  };
}

function setHeaders(res: Response, result: RateLimitResult) {
  res.setHeader("X-RateLimit-Limit", String(result.limit));
  res.setHeader("X-RateLimit-Remaining", String(result.remaining));
  res.setHeader("X-RateLimit-Reset", String(result.resetAt));
}
