import { createClient } from "redis";
import { getConfig } from "./config.js";
import { getAppLogger } from "../logging/logger.js";

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

export async function initializeRedis(): Promise<RedisClient> {
  if (client) {
    return client;
  }

  const config = getConfig();
  if (!config.redisUrl) {
    throw new Error("REDIS_URL is not configured");
  }

  const logger = getAppLogger().child?.({ module: "redis" });
  const created = createClient({
    url: config.redisUrl,
    socket: {
      connectTimeout: 5000
    }
  });

  created.on("error", (error: unknown) => {
    logger?.error?.({ err: error }, "redis.client_error");
  });
  created.on("ready", () => {
    logger?.info?.({}, "redis.connected");
  });
  created.on("end", () => {
    logger?.info?.({}, "redis.disconnected");
  });

  await created.connect();

  try {
    await created.ping();
  } catch (error) {
    await created.disconnect();
    throw new Error(`Failed to connect to Redis: ${String(error)}`);
  }

  client = created;
  return client;
}

export async function healthCheckRedis(): Promise<boolean> {
  try {
    if (!client || !client.isOpen) {
      return false;
    }

    await client.ping();
    return true;
  } catch {
    return false;
  }
}

export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
