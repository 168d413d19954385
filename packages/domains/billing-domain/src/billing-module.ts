import { type Logger, noopLogger } from '@billmirror/domain-kernel';
import { BillingActions } from './application/billing-actions.js';
import type { BillingGateway } from './processor/billing-gateway.js';
import type { BillingRepositories } from './repositories/index.js';
import { CatalogSync } from './services/catalog-sync.js';
import { ChargeSync } from './services/charge-sync.js';
import { CustomerService } from './services/customer-service.js';
import { CustomerSync } from './services/customer-sync.js';
import { EventProcessor } from './services/event-processor.js';
import { InvoiceService } from './services/invoice-service.js';
import { PlanSync } from './services/plan-sync.js';
import { ReceiptHook, type ReceiptSender } from './services/receipt-hook.js';
import { ReportingService } from './services/reporting-service.js';
import { SubscriptionSync } from './services/subscription-sync.js';
import { TransferSync } from './services/transfer-sync.js';
import type { PlanCatalog } from './value-objects/plan-catalog.js';

export interface BillingModuleDeps {
  gateway: BillingGateway;
  repositories: BillingRepositories;
  receiptSender: ReceiptSender;
  plans: PlanCatalog;
  sendEmailReceipts?: boolean;
  logger?: Logger;
}

export interface BillingModule {
  plans: PlanSync;
  catalog: CatalogSync;
  customerSync: CustomerSync;
  subscriptions: SubscriptionSync;
  charges: ChargeSync;
  receipts: ReceiptHook;
  invoices: InvoiceService;
  transfers: TransferSync;
  events: EventProcessor;
  customers: CustomerService;
  reporting: ReportingService;
  actions: BillingActions;
}

/** Wires every billing service over one gateway and one set of repositories. */
export function createBillingModule(deps: BillingModuleDeps): BillingModule {
  const { gateway, repositories: repos } = deps;
  const logger = deps.logger ?? noopLogger;
  const log = (component: string) => logger.child({ component });

  const plans = new PlanSync(gateway, repos.catalog, log('plan-sync'));
  const catalog = new CatalogSync(gateway, repos.catalog, log('catalog-sync'));
  const customerSync = new CustomerSync(
    gateway,
    repos.customers,
    repos.subscriptions,
    log('customer-sync'),
  );
  const subscriptions = new SubscriptionSync(
    gateway,
    repos.subscriptions,
    repos.catalog,
    log('subscription-sync'),
  );
  const charges = new ChargeSync(
    gateway,
    repos.charges,
    repos.customers,
    repos.invoices,
    log('charge-sync'),
  );
  const receipts = new ReceiptHook(
    deps.receiptSender,
    repos.charges,
    repos.customers,
    log('receipts'),
  );
  const invoices = new InvoiceService(
    gateway,
    repos.invoices,
    repos.customers,
    repos.charges,
    repos.subscriptions,
    repos.catalog,
    charges,
    subscriptions,
    receipts,
    { sendEmailReceipts: deps.sendEmailReceipts ?? true },
    log('invoices'),
  );
  const transfers = new TransferSync(repos.transfers, log('transfer-sync'));
  const events = new EventProcessor(
    gateway,
    repos.events,
    repos.customers,
    {
      invoices,
      charges,
      transfers,
      subscriptions,
      customers: customerSync,
      plans,
      catalog,
    },
    log('events'),
  );
  const customers = new CustomerService(
    gateway,
    repos.customers,
    repos.subscriptions,
    customerSync,
    subscriptions,
    invoices,
    deps.plans,
    log('customers'),
  );

  return {
    plans,
    catalog,
    customerSync,
    subscriptions,
    charges,
    receipts,
    invoices,
    transfers,
    events,
    customers,
    reporting: new ReportingService(repos.reporting),
    actions: new BillingActions(customers, deps.plans, log('actions')),
  };
}
