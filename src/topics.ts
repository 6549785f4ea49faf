import { Subscription, Topic, TOPICS } from "./types";

export function getSubscriptions(pubsubName: string): Subscription[] {
  return TOPICS.map((topic) => ({
    pubsubname: pubsubName,
    topic,
    route: topic,
  }));
}

export function topicForPath(path: string): Topic | undefined {
  const trimmed = path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
  return TOPICS.find((topic) => trimmed.endsWith(topic));
}

