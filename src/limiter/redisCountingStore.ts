import { randomUUID } from "node:crypto";
import { CountingStore } from "./countingStore";
import { CountingStoreError } from "../errors";

type ExecReply = [error: Error | null, result: unknown][] | null;

/**
 * The slice of an ioredis client used here. A `Redis` instance satisfies it;
 * tests hand in an in-process stand-in.
 */
export interface SortedSetClient {
  multi(): SortedSetTransaction;
}

export interface SortedSetTransaction {
  zremrangebyscore(
    key: string,
    min: number | string,
    max: number | string
  ): SortedSetTransaction;
  zadd(key: string, score: number, member: string): SortedSetTransaction;
  zcard(key: string): SortedSetTransaction;
  expire(key: string, seconds: number): SortedSetTransaction;
  exec(): Promise<ExecReply>;
}

const CARDINALITY_REPLY = 2;

export class RedisCountingStore implements CountingStore {
  constructor(private readonly redis: SortedSetClient) {}

  async hit(
    key: string,
    nowSeconds: number,
    windowSeconds: number
  ): Promise<number> {
    const windowStart = nowSeconds - windowSeconds;

    let replies: ExecReply;
    try {
      replies = await this.redis
        .multi()
        .zremrangebyscore(key, 0, windowStart)
        // Unique member: requests landing in the same second must each count.
        .zadd(key, nowSeconds, `${nowSeconds}-${randomUUID()}`)
        .zcard(key)
        .expire(key, windowSeconds)
        .exec();
    } catch (err) {
      throw new CountingStoreError(`Transaction on ${key} failed`, {
        cause: err,
      });
    }

    if (!replies) {
      throw new CountingStoreError(`Transaction on ${key} was aborted`);
    }

    const failed = replies.find(([error]) => error !== null);
    if (failed) {
      throw new CountingStoreError(`Transaction on ${key} failed`, {
        cause: failed[0],
      });
    }

    const count = replies[CARDINALITY_REPLY]?.[1];
    if (typeof count !== "number" || !Number.isInteger(count)) {
      throw new CountingStoreError(
        `Unexpected ZCARD reply for ${key}: ${String(count)}`
      );
    }

    return count;
  }
}
