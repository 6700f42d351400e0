import { LimiterConfig } from "../types/policy";
import { RateLimitResult } from "../types/decision";
import { CountingStoreError } from "../errors";

export interface SlidingWindowOptions {
  /** Upper bound on the store round trip, in milliseconds. */
  timeoutMs?: number;
  /** Milliseconds since epoch. */
  clock?: () => number;
}

const DEFAULT_STORE_TIMEOUT_MS = 500;

export class SlidingWindowLimiter {
  private readonly timeoutMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly config: Readonly<LimiterConfig>,
    options: SlidingWindowOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Records one request for `key` and reports whether it fits the quota.
   * Rejects with CountingStoreError when the store transaction fails or
   * does not answer within the timeout.
   */
  async consume(key: string): Promise<RateLimitResult> {
    const { store, limit, windowSeconds } = this.config;
    const now = Math.floor(this.clock() / 1000);

    const count = await this.withTimeout(
      store.hit(key, now, windowSeconds),
      key
    );

    // Inclusive: the request being evaluated is part of `count`.
    const allowed = count <= limit;

    return {
      allowed,
      count,
      limit,
      remaining: Math.max(0, limit - count),
      resetAt: now + windowSeconds,
    };
  }

  private withTimeout<T>(pending: Promise<T>, key: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new CountingStoreError(
            `Transaction on ${key} timed out after ${this.timeoutMs}ms`
          )
        );
      }, this.timeoutMs);

      pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }
}
