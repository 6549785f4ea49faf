import { AppConfig } from "./config";
import { RedisMessageStore } from "./redis-store";
import { Topic, TOPICS } from "./types";

export interface MessageStore {
  /** Resolves true when the message was not yet recorded for the topic. */
  add(topic: Topic, message: string): Promise<boolean>;
  /** Recorded messages, sorted ascending. */
  list(topic: Topic): Promise<string[]>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export class MemoryMessageStore implements MessageStore {
  private sets: Map<Topic, Set<string>> = new Map(
    TOPICS.map((topic): [Topic, Set<string>] => [topic, new Set()])
  );

  private setFor(topic: Topic): Set<string> {
    let set = this.sets.get(topic);
    if (!set) {
      set = new Set();
      this.sets.set(topic, set);
    }
    return set;
  }

  async add(topic: Topic, message: string): Promise<boolean> {
    const set = this.setFor(topic);
    if (set.has(message)) return false;
    set.add(message);
    return true;
  }

  async list(topic: Topic): Promise<string[]> {
    return Array.from(this.setFor(topic)).sort();
  }

  async clear(): Promise<void> {
    for (const topic of TOPICS) {
      this.sets.set(topic, new Set());
    }
  }

  async close(): Promise<void> {
    this.sets.clear();
  }
}

export function createStore(config: AppConfig): MessageStore {
  if (config.redisUrl) {
    console.log(`Storing received messages in Redis under "${config.redisKeyPrefix}:*"`);
    return RedisMessageStore.connect(config.redisUrl, config.redisKeyPrefix);
  }
  return new MemoryMessageStore();
}
