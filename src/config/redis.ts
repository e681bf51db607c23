/**
 * Redis client for BullMQ (QUEUE_DRIVER=redis)
 */

import { Redis } from "ioredis";

export function createRedisConnection(url: string): Redis {
  // Parse the Redis URL to extract connection details
  const redisUrl = new URL(url);

  const redis = new Redis({
    host: redisUrl.hostname,
    port: parseInt(redisUrl.port || "6379", 10),
    password: redisUrl.password || undefined,
    username: redisUrl.username || undefined,

    // BullMQ requirements
    maxRetriesPerRequest: null,
    enableReadyCheck: false,

    connectTimeout: 60000,
    keepAlive: 30000,

    // rediss:// means TLS (Upstash and most hosted Redis)
    tls: redisUrl.protocol === "rediss:" ? { rejectUnauthorized: true } : undefined,

    // Retry strategy for connection issues
    retryStrategy: (times: number) => {
      if (times > 20) {
        console.error(`[Redis] Failed to connect after ${times} attempts`);
        return null; // Stop retrying
      }
      const delay = Math.min(times * 500, 5000);
      console.log(`[Redis] Retry attempt ${times}, waiting ${delay}ms`);
      return delay;
    },

    // Reconnect if Redis fails over to a read-only replica
    reconnectOnError: (err) => err.message.includes("READONLY"),
  });

  redis.on("error", (err) => {
    console.error("[Redis] Connection error:", err.message);
  });

  redis.on("ready", () => {
    console.log("[Redis] Ready to accept commands");
  });

  return redis;
}
