// ============================================
// Redis Connection & BullMQ Helpers
// ============================================

import { Queue, type QueueOptions } from "bullmq";
import { Redis } from "ioredis";
import { loadConfig } from "./config.js";

let connection: Redis | null = null;

export function getRedisConnection(): Redis {
  if (!connection) {
    const { redis } = loadConfig();
    connection = new Redis({
      host: redis.host,
      port: redis.port,
      password: redis.password,
      maxRetriesPerRequest: null,
    });
  }
  return connection;
}

export function createQueue(name: string, opts?: Partial<QueueOptions>): Queue {
  return new Queue(name, {
    connection: getRedisConnection(),
    ...opts,
  });
}

export async function closeRedis(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
  }
}
