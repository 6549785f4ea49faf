import dotenv from "dotenv";
dotenv.config();

export type AppConfig = {
  port: number;
  pubsubName: string;
  redisUrl?: string;
  redisKeyPrefix: string;
};

export class ConfigError extends Error {
  constructor(message: string, public readonly variable: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_PORT = 3000;
const DEFAULT_PUBSUB_NAME = "messagebus";
const DEFAULT_REDIS_KEY_PREFIX = "pubsub-subscriber";

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parsePort(raw: string, variable: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`${variable} must be an integer between 1 and 65535, got "${raw}"`, variable);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const portVar = readVar(env, "APP_PORT") !== undefined ? "APP_PORT" : "PORT";
  const rawPort = readVar(env, portVar);

  return {
    port: rawPort === undefined ? DEFAULT_PORT : parsePort(rawPort, portVar),
    pubsubName: readVar(env, "PUBSUB_NAME") ?? DEFAULT_PUBSUB_NAME,
    redisUrl: readVar(env, "REDIS_URL"),
    redisKeyPrefix: readVar(env, "REDIS_KEY_PREFIX") ?? DEFAULT_REDIS_KEY_PREFIX,
  };
}
