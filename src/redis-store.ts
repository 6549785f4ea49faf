import Redis, { RedisOptions } from "ioredis";
import { MessageStore } from "./store";
import { Topic, TOPICS } from "./types";

// A command fails fast instead of queueing through a long reconnect.
export const REDIS_CONNECTION_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: 1,
  commandTimeout: 2000,
};

export class RedisMessageStore implements MessageStore {
  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string
  ) {}

  static connect(url: string, keyPrefix: string): RedisMessageStore {
    const redis = new Redis(url, REDIS_CONNECTION_OPTIONS);
    redis.on("error", (e) => console.error("redis store error", e));
    return new RedisMessageStore(redis, keyPrefix);
  }

  private key(topic: Topic): string {
    return `${this.keyPrefix}:${topic}`;
  }

  async add(topic: Topic, message: string): Promise<boolean> {
    try {
      const added = await this.redis.sadd(this.key(topic), message);
      return added === 1;
    } catch (err) {
      console.error("Error recording message in Redis", { topic, error: err });
      throw err;
    }
  }

  async list(topic: Topic): Promise<string[]> {
    try {
      const members = await this.redis.smembers(this.key(topic));
      return members.sort();
    } catch (err) {
      console.error("Error listing messages from Redis", { topic, error: err });
      throw err;
    }
  }

  async clear(): Promise<void> {
    try {
      await this.redis.del(...TOPICS.map((topic) => this.key(topic)));
    } catch (err) {
      console.error("Error clearing messages in Redis", { keyPrefix: this.keyPrefix, error: err });
      throw err;
    }
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (err) {
      console.error("Error closing Redis connection", err);
      throw err;
    }
  }
}
