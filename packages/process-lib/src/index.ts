// Redis
export { getRedis, closeRedis } from './redis/connection.js';

// BullMQ
export { createQueue, createWorker } from './bullmq/job-processor.js';
export type { JobContext, JobHandler } from './bullmq/job-processor.js';

// Database
export { getDb } from './database/connection.js';
export type { Database } from './database/connection.js';

// Scheduler
export { registerScheduledJobs } from './scheduler/cron.js';
export type { ScheduledJob } from './scheduler/cron.js';

// Health
export { startHealthServer } from './health/server.js';
export type { HealthServerOptions } from './health/server.js';

// Logging
export { createLogger } from './logger/logger.js';
export type { Logger } from './logger/logger.js';
