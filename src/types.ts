export const TOPIC_A = "pubsub-a-topic";
export const TOPIC_B = "pubsub-b-topic";
export const TOPIC_C = "pubsub-c-topic";

export const TOPICS = [TOPIC_A, TOPIC_B, TOPIC_C] as const;

export type Topic = (typeof TOPICS)[number];

export type DeliveryStatus = "SUCCESS" | "RETRY" | "DROP";

// Fields left undefined are dropped by JSON serialization.
export type AppResponse = {
  status?: DeliveryStatus;
  message?: string;
};

export type Subscription = {
  pubsubname: string;
  topic: Topic;
  route: string;
};

export type ReceivedMessages = Record<Topic, string[]>;

export type BehaviorFlags = {
  respondWithError: boolean;
  respondWithRetry: boolean;
  respondWithEmptyJSON: boolean;
};
