import type { CatalogRepository } from './catalog-repository.js';
import type { ChargeRepository } from './charge-repository.js';
import type { CustomerRepository } from './customer-repository.js';
import type { EventRepository } from './event-repository.js';
import type { InvoiceRepository } from './invoice-repository.js';
import type { ReportingRepository } from './reporting-repository.js';
import type { SubscriptionRepository } from './subscription-repository.js';
import type { TransferRepository } from './transfer-repository.js';

export type { CatalogRepository } from './catalog-repository.js';
export type { ChargeRepository } from './charge-repository.js';
export type { CustomerRepository } from './customer-repository.js';
export type { EventRepository } from './event-repository.js';
export type { InvoiceRepository } from './invoice-repository.js';
export type { CustomerCohortFilter, PlanCount, ReportingRepository } from './reporting-repository.js';
export type { SubscriptionRepository } from './subscription-repository.js';
export type { TransferRepository } from './transfer-repository.js';

/** The full set of stores the billing services read and write. */
export interface BillingRepositories {
  customers: CustomerRepository;
  catalog: CatalogRepository;
  subscriptions: SubscriptionRepository;
  charges: ChargeRepository;
  invoices: InvoiceRepository;
  transfers: TransferRepository;
  events: EventRepository;
  reporting: ReportingRepository;
}
