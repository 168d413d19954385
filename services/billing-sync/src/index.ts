import { createBillingModule, type ReceiptSender } from '@billmirror/billing-domain';
import {
  closeRedis,
  createLogger,
  createWorker,
  getDb,
  getRedis,
  registerScheduledJobs,
  startHealthServer,
} from '@billmirror/process-lib';
import type { Worker } from 'bullmq';
import { loadConfig, loadPlanCatalog } from './config.js';
import { LoggingReceiptSender, SmtpReceiptSender } from './infrastructure/receipt-senders.js';
import { createDrizzleRepositories } from './infrastructure/repositories/index.js';
import { StripeBillingGateway, createStripeClient } from './infrastructure/stripe-gateway.js';
import { QUEUES, SCHEDULES, createJobHandlers } from './jobs/handlers.js';

const logger = createLogger('billing-sync');

function logFailures<TData, TResult>(worker: Worker<TData, TResult>): Worker<TData, TResult> {
  worker.on('failed', (job, err) => {
    logger.error(
      { queue: worker.name, jobId: job?.id, attempts: job?.attemptsMade, err },
      'Job failed',
    );
  });
  return worker;
}

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  const db = getDb(config.databaseUrl);
  const redis = getRedis(config.redisUrl);
  const repositories = createDrizzleRepositories(db);

  const receiptSender: ReceiptSender = config.smtp
    ? new SmtpReceiptSender(config.smtp)
    : new LoggingReceiptSender(logger.child({ component: 'receipts' }));

  const billing = createBillingModule({
    gateway: new StripeBillingGateway(createStripeClient(config.stripeSecretKey)),
    repositories,
    receiptSender,
    plans: loadPlanCatalog(config.plansFile),
    sendEmailReceipts: config.sendEmailReceipts,
    logger,
  });

  const server = startHealthServer(config.port, {
    logger,
    check: async () => (await redis.ping()) === 'PONG',
  });

  const handlers = createJobHandlers({
    billing,
    customers: repositories.customers,
    logger: logger.child({ component: 'jobs' }),
  });
  const workers = [
    logFailures(createWorker(QUEUES.webhookEvent, handlers.webhookEvent)),
    logFailures(createWorker(QUEUES.syncPlans, handlers.syncPlans)),
    logFailures(createWorker(QUEUES.syncCatalog, handlers.syncCatalog)),
    logFailures(createWorker(QUEUES.syncCustomer, handlers.syncCustomer)),
    logFailures(createWorker(QUEUES.retryFailedEvents, handlers.retryFailedEvents)),
  ];

  if (config.disableScheduler) {
    logger.warn('DISABLE_SCHEDULER=true; scheduled syncs not registered');
  } else {
    for (const { queue, jobs } of SCHEDULES) {
      const scheduler = await registerScheduledJobs(queue, jobs);
      await scheduler.close();
    }
  }

  logger.info({ plans: config.plansFile, smtp: config.smtp !== null }, 'Billing sync started');

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    await Promise.all(workers.map((w) => w.close()));
    server.close();
    await closeRedis();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start billing sync');
  process.exit(1);
});
