import { NotFoundError, ProcessorError } from '@billmirror/domain-kernel';
import { beforeEach, describe, expect, it } from 'vitest';
import type { Customer } from '../entities/customer.js';
import type { Plan } from '../entities/plan.js';
import {
  type TestBilling,
  chargePayload,
  createTestBilling,
  invoiceLine,
  invoicePayload,
  planPayload,
  subscriptionPayload,
} from '../testing/index.js';

describe('InvoiceService', () => {
  let t: TestBilling;
  let customer: Customer;
  let plan: Plan;

  beforeEach(async () => {
    t = createTestBilling();
    customer = await t.store.customers.upsert({
      stripeId: 'cus_1',
      userId: 'user-1',
      email: 'member@example.test',
    });
    plan = await t.billing.plans.syncPlan(planPayload());
  });

  describe('syncInvoiceFromStripeData', () => {
    const paidInvoice = () =>
      invoicePayload({
        charge: 'ch_1',
        subscription: 'sub_1',
        paid: true,
        attempted: true,
        attempt_count: 1,
        tax: 82,
        tax_percent: 8.25,
        total: 1231,
        receipt_number: '1001-2001',
        lines: {
          data: [
            invoiceLine({ id: 'sub_1', type: 'subscription', amount: 999 }),
            invoiceLine({ id: 'ii_2', amount: 150, description: 'Setup' }),
          ],
        },
      });

    beforeEach(() => {
      t.gateway.subscriptions.set('sub_1', subscriptionPayload());
      t.gateway.charges.set('ch_1', chargePayload({ invoice: 'in_1' }));
    });

    it('mirrors the invoice with its charge, subscription and line items', async () => {
      const invoice = await t.billing.invoices.syncInvoiceFromStripeData(paidInvoice());

      const subscription = await t.store.subscriptions.findByStripeId('sub_1');
      const charge = await t.store.charges.findByStripeId('ch_1');
      expect(invoice).toMatchObject({
        stripeId: 'in_1',
        customerId: customer.id,
        subscriptionId: subscription?.id,
        chargeId: charge?.id,
        paid: true,
        attempted: true,
        attemptCount: 1,
        amountDue: 999,
        subtotal: 999,
        tax: 82,
        taxPercent: '8.25',
        total: 1231,
        receiptNumber: '1001-2001',
        date: new Date('2013-01-01T00:00:00Z'),
      });
      expect(subscription).toMatchObject({ planId: plan.id, status: 'active', amount: 999 });
      expect(charge?.invoiceId).toBe(invoice.id);

      const items = await t.store.invoices.listItems(invoice.id);
      expect(items).toHaveLength(2);
      expect(items[0]).toMatchObject({
        stripeId: 'sub_1',
        lineType: 'subscription',
        planId: plan.id,
        subscriptionId: subscription?.id,
      });
      expect(items[1]).toMatchObject({
        stripeId: 'ii_2',
        lineType: 'invoiceitem',
        amount: 150,
        description: 'Setup',
        planId: null,
        subscriptionId: null,
      });
    });

    it('sends one receipt per charge across replays', async () => {
      await t.billing.invoices.syncInvoiceFromStripeData(paidInvoice());
      await t.billing.invoices.syncInvoiceFromStripeData(paidInvoice());

      expect(t.receipts.sent).toHaveLength(1);
      expect(t.receipts.sent[0]?.to).toBe('member@example.test');
      expect(t.store.invoiceRows).toHaveLength(1);
      expect(t.store.invoiceItemRows).toHaveLength(2);
      expect((await t.store.charges.findByStripeId('ch_1'))?.receiptSent).toBe(true);
    });

    it('skips the receipt when asked to', async () => {
      await t.billing.invoices.syncInvoiceFromStripeData(paidInvoice(), false);
      expect(t.receipts.sent).toEqual([]);
    });

    it('leaves receipts out when syncing every invoice of a customer', async () => {
      t.gateway.invoices.set('in_1', paidInvoice());

      expect(await t.billing.invoices.syncInvoicesForCustomer(customer)).toBe(1);
      expect(t.receipts.sent).toEqual([]);
      expect((await t.store.charges.findByStripeId('ch_1'))?.receiptSent).toBe(false);
    });

    it('syncs the subscription of a line that is not the invoice subscription', async () => {
      t.gateway.subscriptions.set('sub_2', subscriptionPayload({ id: 'sub_2' }));

      const invoice = await t.billing.invoices.syncInvoiceFromStripeData(
        invoicePayload({
          subscription: 'sub_1',
          lines: {
            data: [invoiceLine({ id: 'sli_1', type: 'subscription', subscription: 'sub_2' })],
          },
        }),
      );

      const lineSubscription = await t.store.subscriptions.findByStripeId('sub_2');
      expect(t.gateway.callsTo('retrieveSubscription')).toEqual([['sub_1'], ['sub_2']]);
      expect(await t.store.invoices.listItems(invoice.id)).toMatchObject([
        { stripeId: 'sli_1', subscriptionId: lineSubscription?.id, planId: plan.id },
      ]);
      expect(invoice.subscriptionId).not.toBe(lineSubscription?.id);
    });

    it('takes the subscription plan when the line plan is not mirrored', async () => {
      const invoice = await t.billing.invoices.syncInvoiceFromStripeData(
        invoicePayload({
          subscription: 'sub_1',
          lines: {
            data: [
              invoiceLine({ id: 'sub_1', type: 'subscription', plan: { id: 'plan_retired' } }),
            ],
          },
        }),
      );

      expect(await t.store.invoices.listItems(invoice.id)).toMatchObject([
        { stripeId: 'sub_1', planId: plan.id, subscriptionId: invoice.subscriptionId },
      ]);
      expect(t.gateway.callsTo('retrieveSubscription')).toEqual([['sub_1']]);
    });

    it('requires the customer to be mirrored', async () => {
      await expect(
        t.billing.invoices.syncInvoiceFromStripeData(invoicePayload({ customer: 'cus_unknown' })),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps going when the subscription cannot be fetched', async () => {
      t.gateway.failNext(
        'retrieveSubscription',
        new ProcessorError('invalid_request', 'Subscription is locked'),
      );
      const invoice = await t.billing.invoices.syncInvoiceFromStripeData(
        invoicePayload({ subscription: 'sub_1' }),
      );
      expect(invoice.subscriptionId).toBeNull();
    });

    it('drops the subscription when it belongs to someone else', async () => {
      t.gateway.subscriptions.set('sub_1', subscriptionPayload({ customer: 'cus_other' }));
      const invoice = await t.billing.invoices.syncInvoiceFromStripeData(
        invoicePayload({ subscription: 'sub_1' }),
      );
      expect(invoice.subscriptionId).toBeNull();
      expect(t.store.subscriptionRows).toEqual([]);
    });
  });

  describe('actions', () => {
    it('reports false when there is nothing to invoice', async () => {
      expect(await t.billing.invoices.createAndPay(customer)).toBe(false);
      expect(t.gateway.callsTo('payInvoice')).toEqual([]);
    });

    it('creates and pays an invoice for pending items', async () => {
      t.gateway.addPendingItem('cus_1', 500);

      expect(await t.billing.invoices.createAndPay(customer)).toBe(true);
      expect(t.gateway.callsTo('payInvoice')).toEqual([['in_1']]);
      expect(t.gateway.invoices.get('in_1')?.paid).toBe(true);
    });

    it('pays an open invoice and mirrors the result', async () => {
      t.gateway.addPendingItem('cus_1', 500);
      const created = await t.billing.invoices.create(customer);
      const open = await t.billing.invoices.syncInvoiceFromStripeData(created);
      expect(open.paid).toBe(false);

      expect(await t.billing.invoices.pay(open)).toBe(true);

      const paid = await t.store.invoices.findByStripeId('in_1');
      expect(paid?.paid).toBe(true);
      expect(paid?.chargeId).not.toBeNull();
      expect(t.receipts.sent).toHaveLength(1);
      expect(await t.billing.invoices.pay(paid ?? open)).toBe(false);
    });

    it('retries unpaid invoices and tolerates ones paid in the meantime', async () => {
      t.gateway.invoices.set('in_a', invoicePayload({ id: 'in_a', amount_due: 700 }));
      t.gateway.invoices.set('in_b', invoicePayload({ id: 'in_b', paid: true }));
      t.gateway.invoices.set('in_c', invoicePayload({ id: 'in_c', amount_due: 300 }));
      t.gateway.failNext(
        'payInvoice',
        new ProcessorError('invalid_request', 'Invoice is already paid'),
      );

      const paid = await t.billing.invoices.retryUnpaidInvoices(customer);

      expect(paid).toBe(1);
      expect(t.gateway.callsTo('payInvoice')).toEqual([['in_a'], ['in_c']]);
      expect(t.store.invoiceRows).toHaveLength(3);
    });

    it('ignores a drafted invoice that is already gone', async () => {
      await expect(t.billing.invoices.deleteDraftedInvoice('in_missing')).resolves.toBeUndefined();
    });

    it('returns null for an empty or unknown invoice id', async () => {
      expect(await t.billing.invoices.retrieve(null)).toBeNull();
      expect(await t.billing.invoices.retrieve('in_missing')).toBeNull();
    });
  });
});
