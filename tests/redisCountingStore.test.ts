import { describe, expect, it } from "vitest";
import {
  RedisCountingStore,
  type SortedSetTransaction,
} from "../src/limiter/redisCountingStore";
import { CountingStoreError } from "../src/errors";
import { FakeRedis } from "./support/fakeRedis";

const T0 = 1_700_000_000;

describe("RedisCountingStore", () => {
  it("runs evict, insert, count and expire in that order", async () => {
    const redis = new FakeRedis(() => T0 * 1000);
    const store = new RedisCountingStore(redis);

    await expect(store.hit("rl:user:42", T0, 60)).resolves.toBe(1);

    expect(redis.executed.map(([name]) => name)).toEqual([
      "zremrangebyscore",
      "zadd",
      "zcard",
      "expire",
    ]);
    expect(redis.executed[0]).toEqual(["zremrangebyscore", "rl:user:42", "0", String(T0 - 60)]);
    expect(redis.executed[1]?.[2]).toBe(String(T0));
    expect(redis.executed[3]).toEqual(["expire", "rl:user:42", "60"]);
    expect(redis.ttlSeconds("rl:user:42")).toBe(60);
  });

  it("counts every request made within the same second", async () => {
    const store = new RedisCountingStore(new FakeRedis(() => T0 * 1000));

    const counts: number[] = [];
    for (let i = 0; i < 3; i++) {
      counts.push(await store.hit("k", T0, 60));
    }

    expect(counts).toEqual([1, 2, 3]);
  });

  it("evicts entries scored at or before the window start", async () => {
    let nowMs = T0 * 1000;
    const redis = new FakeRedis(() => nowMs);
    const store = new RedisCountingStore(redis);

    await store.hit("k", T0, 60);
    nowMs = (T0 + 1) * 1000;
    await store.hit("k", T0 + 1, 60);

    nowMs = (T0 + 60) * 1000;
    await expect(store.hit("k", T0 + 60, 60)).resolves.toBe(2);
    expect(redis.scores("k")).toEqual([T0 + 1, T0 + 60]);
  });

  it("keeps keys independent", async () => {
    const store = new RedisCountingStore(new FakeRedis(() => T0 * 1000));

    await store.hit("rl:user:1", T0, 60);
    await store.hit("rl:user:1", T0, 60);

    await expect(store.hit("rl:ip:10.0.0.1", T0, 60)).resolves.toBe(1);
  });

  it("wraps a failed EXEC in CountingStoreError", async () => {
    const redis = new FakeRedis(() => T0 * 1000);
    const outage = new Error("connect ECONNREFUSED");
    redis.failNextExec = outage;
    const store = new RedisCountingStore(redis);

    const failure = store.hit("k", T0, 60);
    await expect(failure).rejects.toBeInstanceOf(CountingStoreError);
    await expect(failure).rejects.toMatchObject({ cause: outage });
  });

  it("rejects when one command inside the transaction fails", async () => {
    const redis = new FakeRedis(() => T0 * 1000);
    redis.failCommand = "zadd";
    const store = new RedisCountingStore(redis);

    await expect(store.hit("k", T0, 60)).rejects.toThrow("Transaction on k failed");
  });

  it("rejects an aborted transaction", async () => {
    const store = new RedisCountingStore({
      multi() {
        const tx: SortedSetTransaction = {
          zremrangebyscore: () => tx,
          zadd: () => tx,
          zcard: () => tx,
          expire: () => tx,
          exec: async () => null,
        };
        return tx;
      },
    });

    await expect(store.hit("k", T0, 60)).rejects.toThrow("Transaction on k was aborted");
  });
});
