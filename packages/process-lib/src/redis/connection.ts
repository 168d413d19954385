import { Redis } from 'ioredis';
import { createLogger } from '../logger/logger.js';

let redis: Redis | null = null;

/** Shared connection for queues, workers and idempotency keys. The first caller picks the URL. */
export function getRedis(url?: string): Redis {
  if (!redis) {
    const logger = createLogger('redis');
    // BullMQ workers block on the connection; they require unlimited retries.
    redis = new Redis(url ?? process.env.REDIS_URL ?? 'redis://localhost:6379', {
      maxRetriesPerRequest: null,
    });
    redis.on('error', (err: Error) => logger.error({ err }, 'Redis connection error'));
  }
  return redis;
}

export async function closeRedis(): Promise<void> {
  if (redis) {
    const current = redis;
    redis = null;
    await current.quit();
  }
}
