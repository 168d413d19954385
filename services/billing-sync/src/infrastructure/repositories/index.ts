import type { BillingRepositories } from '@billmirror/billing-domain';
import type { Database } from '@billmirror/process-lib';
import { DrizzleCatalogRepository } from './drizzle-catalog-repository.js';
import { DrizzleChargeRepository } from './drizzle-charge-repository.js';
import { DrizzleCustomerRepository } from './drizzle-customer-repository.js';
import { DrizzleEventRepository } from './drizzle-event-repository.js';
import { DrizzleInvoiceRepository } from './drizzle-invoice-repository.js';
import { DrizzleReportingRepository } from './drizzle-reporting-repository.js';
import { DrizzleSubscriptionRepository } from './drizzle-subscription-repository.js';
import { DrizzleTransferRepository } from './drizzle-transfer-repository.js';

export function createDrizzleRepositories(db: Database): BillingRepositories {
  return {
    customers: new DrizzleCustomerRepository(db),
    catalog: new DrizzleCatalogRepository(db),
    subscriptions: new DrizzleSubscriptionRepository(db),
    charges: new DrizzleChargeRepository(db),
    invoices: new DrizzleInvoiceRepository(db),
    transfers: new DrizzleTransferRepository(db),
    events: new DrizzleEventRepository(db),
    reporting: new DrizzleReportingRepository(db),
  };
}
