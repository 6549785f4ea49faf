import Redis from "ioredis";
import { REDIS_CONNECTION_OPTIONS, RedisMessageStore } from "../src/redis-store";
import { createStore, MemoryMessageStore } from "../src/store";

const mockConnections: { url?: string; options?: unknown }[] = [];

jest.mock("ioredis", () => {
  class MockRedis {
    sets: Map<string, Set<string>> = new Map();
    constructor(public url?: string, public options?: unknown) {
      mockConnections.push({ url, options });
    }
    on() {
      return this;
    }
    async sadd(key: string, member: string) {
      const set = this.sets.get(key) ?? new Set<string>();
      this.sets.set(key, set);
      if (set.has(member)) return 0;
      set.add(member);
      return 1;
    }
    async smembers(key: string) {
      return Array.from(this.sets.get(key) ?? []);
    }
    async del(...keys: string[]) {
      let removed = 0;
      for (const key of keys) {
        if (this.sets.delete(key)) removed++;
      }
      return removed;
    }
    async quit() {
      return "OK";
    }
  }
  return { __esModule: true, default: MockRedis };
});

describe("RedisMessageStore", () => {
  let store: RedisMessageStore;

  beforeEach(() => {
    store = new RedisMessageStore(new Redis("redis://localhost:6379"), "fixture");
  });

  test("reports whether a message was new", async () => {
    expect(await store.add("pubsub-a-topic", "hello")).toBe(true);
    expect(await store.add("pubsub-a-topic", "hello")).toBe(false);
    expect(await store.add("pubsub-b-topic", "hello")).toBe(true);
  });

  test("lists members sorted per topic", async () => {
    await store.add("pubsub-c-topic", "b");
    await store.add("pubsub-c-topic", "a");

    expect(await store.list("pubsub-c-topic")).toEqual(["a", "b"]);
    expect(await store.list("pubsub-a-topic")).toEqual([]);
  });

  test("keeps sets under the key prefix", async () => {
    const redis = new Redis("redis://localhost:6379");
    const saddSpy = jest.spyOn(redis, "sadd");
    const prefixed = new RedisMessageStore(redis, "fixture");

    await prefixed.add("pubsub-b-topic", "m");

    expect(saddSpy).toHaveBeenCalledWith("fixture:pubsub-b-topic", "m");
  });

  test("clear empties every topic", async () => {
    await store.add("pubsub-a-topic", "x");
    await store.add("pubsub-b-topic", "y");

    await store.clear();

    expect(await store.list("pubsub-a-topic")).toEqual([]);
    expect(await store.list("pubsub-b-topic")).toEqual([]);
    expect(await store.add("pubsub-a-topic", "x")).toBe(true);
  });

  test("logs and rethrows a failed clear", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const redis = new Redis("redis://localhost:6379");
    jest.spyOn(redis, "del").mockRejectedValue(new Error("connection lost"));

    await expect(new RedisMessageStore(redis, "fixture").clear()).rejects.toThrow("connection lost");
    expect(errorSpy).toHaveBeenCalledWith(
      "Error clearing messages in Redis",
      expect.objectContaining({ keyPrefix: "fixture" })
    );
    errorSpy.mockRestore();
  });

  test("logs and rethrows a failed close", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const redis = new Redis("redis://localhost:6379");
    jest.spyOn(redis, "quit").mockRejectedValue(new Error("already closed"));

    await expect(new RedisMessageStore(redis, "fixture").close()).rejects.toThrow("already closed");
    expect(errorSpy).toHaveBeenCalledWith("Error closing Redis connection", expect.any(Error));
    errorSpy.mockRestore();
  });

  test("connects with bounded command retries", () => {
    mockConnections.length = 0;

    RedisMessageStore.connect("redis://cache:6379", "fixture");

    expect(mockConnections).toEqual([{ url: "redis://cache:6379", options: REDIS_CONNECTION_OPTIONS }]);
    expect(REDIS_CONNECTION_OPTIONS).toEqual({ maxRetriesPerRequest: 1, commandTimeout: 2000 });
  });

  test("close quits the connection", async () => {
    const redis = new Redis("redis://localhost:6379");
    const quitSpy = jest.spyOn(redis, "quit");

    await new RedisMessageStore(redis, "fixture").close();

    expect(quitSpy).toHaveBeenCalled();
  });
});

describe("createStore", () => {
  const base = { port: 3000, pubsubName: "messagebus", redisKeyPrefix: "fixture" };

  test("uses memory without a Redis URL", () => {
    expect(createStore(base)).toBeInstanceOf(MemoryMessageStore);
  });

  test("uses Redis when a URL is configured", () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    expect(createStore({ ...base, redisUrl: "redis://localhost:6379" })).toBeInstanceOf(RedisMessageStore);
    jest.restoreAllMocks();
  });
});
