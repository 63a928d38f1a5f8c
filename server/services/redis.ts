import Redis, { type RedisOptions } from "ioredis";

import { env } from "../config/env";

// BullMQ workers block on Redis; they require maxRetriesPerRequest = null.
const BASE_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: null,
  connectTimeout: 2000,
  enableReadyCheck: true,
  lazyConnect: false,
};

function resolveRedisUrl(): string {
  const url = process.env.REDIS_URL ?? env.REDIS_URL;
  if (!url) {
    throw new Error("REDIS_URL is not configured");
  }
  return url;
}

export function createRedisClient(connectionName?: string): Redis {
  const url = resolveRedisUrl();
  const client = new Redis(url, {
    ...BASE_OPTIONS,
    connectionName,
  });
  client.on("error", (error) => {
    console.error("[REDIS] Connection error", { connectionName, error });
  });
  client.on("ready", () => {
    console.log("[REDIS] ready", { connectionName });
  });
  return client;
}
