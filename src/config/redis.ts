/**
 * Redis connections for BullMQ
 * Queues share one connection; each worker opens its own because it blocks
 * on Redis while waiting for jobs.
 */

import { Redis, type RedisOptions } from "ioredis";
import { REDIS_URL } from "./env.js";

const MAX_CONNECT_ATTEMPTS = 20;

function connectionOptions(url: URL, label: string): RedisOptions {
  return {
    host: url.hostname,
    port: parseInt(url.port || "6379", 10),
    username: url.username || undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: url.pathname.length > 1 ? parseInt(url.pathname.slice(1), 10) : 0,
    tls: url.protocol === "rediss:" ? { rejectUnauthorized: true } : undefined,

    // Required by BullMQ for blocking connections
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    connectTimeout: 30000,

    retryStrategy: (times: number) => {
      if (times > MAX_CONNECT_ATTEMPTS) {
        console.error(`[Redis:${label}] Giving up after ${times} attempts`);
        return null;
      }
      const delay = Math.min(times * 500, 5000);
      console.log(`[Redis:${label}] Retry attempt ${times}, waiting ${delay}ms`);
      return delay;
    },
    // Failover promoted a replica
    reconnectOnError: (err) => err.message.includes("READONLY"),
  };
}

export function createRedisConnection(label: string): Redis {
  const connection = new Redis(connectionOptions(new URL(REDIS_URL), label));

  connection.on("error", (err) => {
    console.error(`[Redis:${label}] Connection error:`, err.message);
  });
  connection.on("ready", () => {
    console.log(`[Redis:${label}] Ready`);
  });

  return connection;
}

/** Shared by every queue producer in this process. */
export const redis = createRedisConnection("queue");
