import { CountingStore } from "../limiter/countingStore";
import { ConfigurationError } from "../errors";

export interface RateLimitPolicy {
  keyPrefix: string;      // namespace for every client key, e.g. "rl:"
  limit: number;          // max requests per window
  windowSeconds: number;  // sliding window length
}

export interface LimiterConfig extends RateLimitPolicy {
  store: CountingStore;
}

/**
 * Builds the limiter configuration shared by every request handler.
 *
 * Throws a ConfigurationError when `limit` or `windowSeconds` is not a
 * positive integer, so a misconfigured service fails at startup instead of
 * silently allowing or denying everything.
 */
export function createLimiterConfig(
  options: LimiterConfig
): Readonly<LimiterConfig> {
  if (!Number.isInteger(options.limit) || options.limit <= 0) {
    throw new ConfigurationError(
      `Rate limit must be a positive integer, got ${options.limit}`
    );
  }

  if (!Number.isInteger(options.windowSeconds) || options.windowSeconds <= 0) {
    throw new ConfigurationError(
      `Rate limit window must be a positive number of seconds, got ${options.windowSeconds}`
    );
  }

  return Object.freeze({
    store: options.store,
    keyPrefix: options.keyPrefix,
    limit: options.limit,
    windowSeconds: options.windowSeconds,
  });
}
