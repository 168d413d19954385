import {
  type Logger,
  NotFoundError,
  isInvalidRequestMatching,
  isProcessorError,
} from '@billmirror/domain-kernel';
import type { Customer } from '../entities/customer.js';
import { type Charge, type Invoice, type InvoiceItem, isPayable } from '../entities/invoice.js';
import type { Plan } from '../entities/plan.js';
import type { Subscription } from '../entities/subscription.js';
import type { BillingGateway, CreateInvoiceParams } from '../processor/billing-gateway.js';
import type { ProcessorInvoice, ProcessorInvoiceLine } from '../processor/payloads.js';
import type { CatalogRepository } from '../repositories/catalog-repository.js';
import type { ChargeRepository } from '../repositories/charge-repository.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { InvoiceRepository } from '../repositories/invoice-repository.js';
import type { SubscriptionRepository } from '../repositories/subscription-repository.js';
import { convertAmountForDb, fromUnix } from '../value-objects/money.js';
import type { ChargeSync } from './charge-sync.js';
import type { ReceiptHook } from './receipt-hook.js';
import type { SubscriptionSync } from './subscription-sync.js';

export interface InvoiceServiceOptions {
  /** Default for `syncInvoiceFromStripeData`'s `sendReceipt`. */
  sendEmailReceipts: boolean;
}

/** Already-resolved rows an invoice sync hands down to its line items. */
export interface InvoiceContext {
  customer: Customer;
  subscription: Subscription | null;
}

export class InvoiceService {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly invoices: InvoiceRepository,
    private readonly customers: CustomerRepository,
    private readonly charges: ChargeRepository,
    private readonly subscriptions: SubscriptionRepository,
    private readonly catalog: CatalogRepository,
    private readonly chargeSync: ChargeSync,
    private readonly subscriptionSync: SubscriptionSync,
    private readonly receipts: ReceiptHook,
    private readonly options: InvoiceServiceOptions,
    private readonly logger: Logger,
  ) {}

  // -----------------------------------------------------------------------
  // Processor actions
  // -----------------------------------------------------------------------

  /**
   * Create an invoice for the customer's pending items. The local mirror
   * catches up through the `invoice.created` webhook.
   */
  async create(customer: Customer, params?: CreateInvoiceParams): Promise<ProcessorInvoice> {
    return this.gateway.createInvoice(customer.stripeId, params);
  }

  async retrieve(invoiceId: string | null | undefined): Promise<ProcessorInvoice | null> {
    if (!invoiceId) return null;
    try {
      return await this.gateway.retrieveInvoice(invoiceId);
    } catch (error) {
      if (isInvalidRequestMatching(error, 'No such invoice')) return null;
      throw error;
    }
  }

  /**
   * Create an invoice and pay it right away when anything is due.
   * Returns false when the customer had nothing to invoice.
   */
  async createAndPay(customer: Customer): Promise<boolean> {
    try {
      const invoice = await this.create(customer);
      if (invoice.amount_due > 0) {
        await this.gateway.payInvoice(invoice.id);
      }
      return true;
    } catch (error) {
      if (
        isProcessorError(error) &&
        error.isInvalidRequest &&
        error.message.endsWith('Nothing to invoice for customer')
      ) {
        return false;
      }
      throw error;
    }
  }

  /** Pay an open invoice and mirror the result. False when already paid or closed. */
  async pay(invoice: Invoice, sendReceipt = true): Promise<boolean> {
    if (!isPayable(invoice)) return false;
    const paid = await this.gateway.payInvoice(invoice.stripeId);
    await this.syncInvoiceFromStripeData(paid, sendReceipt);
    return true;
  }

  async deleteDraftedInvoice(invoiceId: string): Promise<void> {
    try {
      await this.gateway.deleteInvoice(invoiceId);
    } catch (error) {
      if (isInvalidRequestMatching(error, 'No such invoice')) {
        this.logger.debug({ invoiceId }, 'Drafted invoice already gone');
        return;
      }
      throw error;
    }
  }

  // -----------------------------------------------------------------------
  // Sync
  // -----------------------------------------------------------------------

  async syncInvoiceFromStripeData(
    payload: ProcessorInvoice,
    sendReceipt: boolean = this.options.sendEmailReceipts,
  ): Promise<Invoice> {
    const customer = await this.customers.findByStripeId(payload.customer);
    if (!customer) {
      throw new NotFoundError('Customer', payload.customer);
    }

    let charge: Charge | null = null;
    if (payload.charge) {
      charge = await this.chargeSync.syncCharge(payload.charge);
      if (sendReceipt) {
        charge = await this.receipts.sendReceipt(charge);
      }
    }

    let subscription: Subscription | null = null;
    try {
      const stripeSubscription = await this.subscriptionSync.retrieve(
        customer,
        payload.subscription,
      );
      if (stripeSubscription) {
        subscription = await this.subscriptionSync.syncSubscriptionFromStripeData(
          customer,
          stripeSubscription,
        );
      }
    } catch (error) {
      if (!(isProcessorError(error) && error.isInvalidRequest)) throw error;
      this.logger.warn(
        { invoiceId: payload.id, subscriptionId: payload.subscription, err: error.message },
        'Invoice subscription could not be retrieved',
      );
    }

    const { currency } = payload;
    const invoice = await this.invoices.upsert({
      stripeId: payload.id,
      customerId: customer.id,
      attempted: payload.attempted,
      attemptCount: payload.attempt_count,
      amountDue: convertAmountForDb(payload.amount_due, currency),
      closed: payload.closed,
      paid: payload.paid,
      periodEnd: fromUnix(payload.period_end),
      periodStart: fromUnix(payload.period_start),
      subtotal: convertAmountForDb(payload.subtotal, currency),
      tax: convertAmountForDb(payload.tax, currency),
      taxPercent:
        payload.tax_percent === null || payload.tax_percent === undefined
          ? null
          : String(payload.tax_percent),
      total: convertAmountForDb(payload.total, currency),
      currency,
      metadata: payload.metadata,
      date: fromUnix(payload.date ?? payload.created),
      chargeId: charge?.id ?? null,
      subscriptionId: subscription?.id ?? null,
      receiptNumber: payload.receipt_number ?? '',
    });

    if (charge && charge.invoiceId !== invoice.id) {
      await this.charges.update(charge.id, { invoiceId: invoice.id });
    }

    await this.syncInvoiceItems(invoice, payload.lines.data, { customer, subscription });

    this.logger.debug(
      { invoiceId: invoice.stripeId, customerId: customer.stripeId, paid: invoice.paid },
      'Invoice synced',
    );
    return invoice;
  }

  /**
   * Replace the invoice's line items with `lines` (as found on the invoice's
   * `lines` property, which carries a `type` per line).
   */
  async syncInvoiceItems(
    invoice: Invoice,
    lines: ProcessorInvoiceLine[],
    context?: InvoiceContext,
  ): Promise<InvoiceItem[]> {
    const customer = context?.customer ?? (await this.customers.findById(invoice.customerId));
    if (!customer) {
      throw new NotFoundError('Customer', invoice.customerId);
    }
    const invoiceSubscription =
      context?.subscription ??
      (invoice.subscriptionId ? await this.subscriptions.findById(invoice.subscriptionId) : null);

    await this.invoices.deleteItems(invoice.id);

    const items: InvoiceItem[] = [];
    for (const line of lines) {
      let plan: Plan | null = line.plan
        ? await this.catalog.findPlanByStripeId(line.plan.id)
        : null;

      let subscription: Subscription | null = null;
      if (line.type === 'subscription') {
        subscription = await this.lineSubscription(customer, invoiceSubscription, line);
        if (!plan && subscription?.planId) {
          plan = await this.catalog.findPlanById(subscription.planId);
        }
      }

      items.push(
        await this.invoices.upsertItem({
          invoiceId: invoice.id,
          stripeId: line.id,
          amount: convertAmountForDb(line.amount, line.currency),
          currency: line.currency,
          proration: line.proration,
          description: line.description ?? '',
          lineType: line.type,
          planId: plan?.id ?? null,
          periodStart: fromUnix(line.period.start),
          periodEnd: fromUnix(line.period.end),
          quantity: line.quantity ?? null,
          subscriptionId: subscription?.id ?? null,
        }),
      );
    }
    return items;
  }

  private async lineSubscription(
    customer: Customer,
    invoiceSubscription: Subscription | null,
    line: ProcessorInvoiceLine,
  ): Promise<Subscription | null> {
    // Subscription lines are identified by the subscription id on older API
    // versions, and carry it in `subscription` on newer ones.
    const subscriptionId = line.subscription ?? line.id;
    if (invoiceSubscription && invoiceSubscription.stripeId === subscriptionId) {
      return invoiceSubscription;
    }
    const payload = await this.subscriptionSync.retrieve(customer, subscriptionId);
    return payload ? this.subscriptionSync.syncSubscriptionFromStripeData(customer, payload) : null;
  }

  /** Mirror every invoice the processor lists for the customer, without receipts. */
  async syncInvoicesForCustomer(customer: Customer): Promise<number> {
    let count = 0;
    for await (const payload of this.gateway.listCustomerInvoices(customer.stripeId)) {
      await this.syncInvoiceFromStripeData(payload, false);
      count += 1;
    }
    return count;
  }

  /** Pay every mirrored invoice of the customer that is still open. */
  async retryUnpaidInvoices(customer: Customer): Promise<number> {
    await this.syncInvoicesForCustomer(customer);

    let paid = 0;
    for (const invoice of await this.invoices.listByCustomer(customer.id)) {
      if (!isPayable(invoice)) continue;
      try {
        if (await this.pay(invoice)) paid += 1;
      } catch (error) {
        if (!isInvalidRequestMatching(error, 'Invoice is already paid')) throw error;
      }
    }
    return paid;
  }
}
