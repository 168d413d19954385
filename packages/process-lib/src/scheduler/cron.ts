import type { Queue } from 'bullmq';
import { createQueue } from '../bullmq/job-processor.js';

export interface ScheduledJob {
  name: string;
  /** Cron pattern, evaluated in UTC. */
  pattern: string;
  data?: Record<string, unknown>;
}

/**
 * Upserts one job scheduler per entry and drops schedulers on the queue
 * that are no longer listed, so a renamed job does not keep firing.
 */
export async function registerScheduledJobs(
  queueName: string,
  jobs: ScheduledJob[],
): Promise<Queue> {
  const queue = createQueue(queueName);
  const wanted = new Set(jobs.map((job) => job.name));

  for (const existing of await queue.getJobSchedulers()) {
    if (!wanted.has(existing.key)) {
      await queue.removeJobScheduler(existing.key);
    }
  }
  for (const job of jobs) {
    await queue.upsertJobScheduler(
      job.name,
      { pattern: job.pattern, tz: 'UTC' },
      { data: job.data ?? {} },
    );
  }
  return queue;
}
