import { Mutex } from "./mutex";
import { MessageStore } from "./store";
import { BehaviorFlags, ReceivedMessages, Topic, TOPIC_A, TOPIC_B, TOPIC_C } from "./types";

/**
 * Shared state of the subscriber: received-message sets plus the behavior
 * flags the test harness arms.
 *
 * Flags are plain synchronous state, so arming or reading them never waits on
 * the store. Store calls are serialized through the mutex.
 *
 * Flags are one-directional; `initialize` clears the sets and leaves them set.
 */
export class SubscriberState {
  private readonly mutex = new Mutex();
  private behavior: BehaviorFlags = {
    respondWithError: false,
    respondWithRetry: false,
    respondWithEmptyJSON: false,
  };

  constructor(private readonly store: MessageStore) {}

  flags(): BehaviorFlags {
    return { ...this.behavior };
  }

  armError(): void {
    this.behavior.respondWithError = true;
  }

  armRetry(): void {
    this.behavior.respondWithRetry = true;
  }

  armEmptyJSON(): void {
    this.behavior.respondWithEmptyJSON = true;
  }

  record(topic: Topic, message: string): Promise<boolean> {
    return this.mutex.lock(() => this.store.add(topic, message));
  }

  received(): Promise<ReceivedMessages> {
    return this.mutex.lock(async () => ({
      [TOPIC_A]: await this.store.list(TOPIC_A),
      [TOPIC_B]: await this.store.list(TOPIC_B),
      [TOPIC_C]: await this.store.list(TOPIC_C),
    }));
  }

  initialize(): Promise<void> {
    return this.mutex.lock(() => this.store.clear());
  }

  close(): Promise<void> {
    return this.mutex.lock(() => this.store.close());
  }
}
