import type { BillingModule, CustomerRepository } from '@billmirror/billing-domain';
import { type Logger, ValidationError } from '@billmirror/domain-kernel';
import type { JobHandler, ScheduledJob } from '@billmirror/process-lib';
import { UnrecoverableError } from 'bullmq';

export const QUEUES = {
  webhookEvent: 'billing:webhook-event',
  syncPlans: 'billing:sync-plans',
  syncCatalog: 'billing:sync-catalog',
  syncCustomer: 'billing:sync-customer',
  retryFailedEvents: 'billing:retry-failed-events',
} as const;

export interface WebhookEventJob {
  /** The webhook body exactly as the processor posted it. */
  payload: unknown;
}

export interface SyncCustomerJob {
  /** Processor customer id. */
  customerId: string;
}

export interface RetryFailedEventsJob {
  limit?: number;
}

export type ScheduledJobData = Record<string, unknown>;

export interface JobHandlerDeps {
  billing: BillingModule;
  customers: CustomerRepository;
  logger: Logger;
}

export interface BillingJobHandlers {
  webhookEvent: JobHandler<WebhookEventJob, { success: true; duplicate: boolean; processed: boolean }>;
  syncPlans: JobHandler<ScheduledJobData, { success: true; plans: number }>;
  syncCatalog: JobHandler<ScheduledJobData, { success: true; products: number; skus: number }>;
  syncCustomer: JobHandler<
    SyncCustomerJob,
    { success: true; found: boolean; subscriptions: number; invoices: number }
  >;
  retryFailedEvents: JobHandler<RetryFailedEventsJob, { success: true; processed: number }>;
}

export const SCHEDULES: Array<{ queue: string; jobs: ScheduledJob[] }> = [
  {
    queue: QUEUES.syncPlans,
    jobs: [{ name: 'sync-plans', pattern: '0 * * * *', data: { type: 'sync-plans' } }], // hourly
  },
  {
    queue: QUEUES.syncCatalog,
    jobs: [{ name: 'sync-catalog', pattern: '30 * * * *', data: { type: 'sync-catalog' } }], // hourly
  },
  {
    queue: QUEUES.retryFailedEvents,
    jobs: [{ name: 'retry-failed-events', pattern: '*/15 * * * *', data: {} }],
  },
];

export function createJobHandlers({ billing, customers, logger }: JobHandlerDeps): BillingJobHandlers {
  return {
    webhookEvent: {
      name: QUEUES.webhookEvent,
      concurrency: 5,
      async process(job) {
        try {
          const receipt = await billing.events.receiveWebhook(job.data.payload);
          logger.info(
            {
              jobId: job.id,
              eventId: receipt.event?.stripeId,
              kind: receipt.event?.kind,
              duplicate: receipt.duplicate,
            },
            'Webhook event handled',
          );
          return {
            success: true,
            duplicate: receipt.duplicate,
            processed: receipt.event?.processed ?? false,
          };
        } catch (error) {
          // a malformed body will not get better on retry
          if (error instanceof ValidationError) {
            throw new UnrecoverableError(error.message);
          }
          throw error;
        }
      },
    },

    syncPlans: {
      name: QUEUES.syncPlans,
      concurrency: 1,
      async process() {
        const plans = await billing.plans.syncPlans();
        logger.info({ plans }, 'Plans synced');
        return { success: true, plans };
      },
    },

    syncCatalog: {
      name: QUEUES.syncCatalog,
      concurrency: 1,
      async process() {
        const products = await billing.catalog.syncProducts();
        const skus = await billing.catalog.syncSkus();
        logger.info({ products, skus }, 'Catalog synced');
        return { success: true, products, skus };
      },
    },

    syncCustomer: {
      name: QUEUES.syncCustomer,
      concurrency: 5,
      async process(job) {
        const { customerId } = job.data;
        const customer = await customers.findByStripeId(customerId);
        if (!customer) {
          logger.warn({ customerId }, 'Customer not mirrored; nothing to sync');
          return { success: true, found: false, subscriptions: 0, invoices: 0 };
        }

        const synced = await billing.customerSync.syncCustomer(customer);
        if (synced.purgedAt) {
          return { success: true, found: true, subscriptions: 0, invoices: 0 };
        }
        const subscriptions = await billing.subscriptions.syncCustomerSubscriptions(synced);
        const invoices = await billing.invoices.syncInvoicesForCustomer(synced);
        logger.info(
          { customerId, subscriptions: subscriptions.length, invoices },
          'Customer synced',
        );
        return { success: true, found: true, subscriptions: subscriptions.length, invoices };
      },
    },

    retryFailedEvents: {
      name: QUEUES.retryFailedEvents,
      concurrency: 1,
      async process(job) {
        const processed = await billing.events.processPending(job.data.limit);
        if (processed > 0) logger.info({ processed }, 'Pending events processed');
        return { success: true, processed };
      },
    },
  };
}
