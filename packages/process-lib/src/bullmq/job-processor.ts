import { type Job, Queue, Worker } from 'bullmq';
import { getRedis } from '../redis/connection.js';

const IDEMPOTENCY_TTL_SECONDS = 86400;

/** The part of a BullMQ job a handler reads. */
export type JobContext<TData> = Pick<Job<TData>, 'id' | 'name' | 'data' | 'attemptsMade'>;

export interface JobHandler<TData = unknown, TResult = unknown> {
  name: string;
  process(job: JobContext<TData>): Promise<TResult>;
  concurrency?: number;
}

export function createQueue<TData = unknown>(name: string): Queue<TData> {
  return new Queue<TData>(name, { connection: getRedis() });
}

/**
 * Worker that skips a job id it already completed within the last day, so a
 * job enqueued twice under the same id runs once.
 */
export function createWorker<TData, TResult>(
  queueName: string,
  handler: JobHandler<TData, TResult>,
): Worker<TData, TResult | null> {
  return new Worker<TData, TResult | null>(
    queueName,
    async (job) => {
      const redis = getRedis();
      const idempotencyKey = `idem:${queueName}:${job.id}`;
      const existing = await redis.get(idempotencyKey);
      if (existing) return null;
      const result = await handler.process(job);
      await redis.setex(idempotencyKey, IDEMPOTENCY_TTL_SECONDS, '1');
      return result;
    },
    { connection: getRedis(), concurrency: handler.concurrency ?? 5 },
  );
}
