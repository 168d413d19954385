import { ValidationError } from '@billmirror/domain-kernel';
import { beforeEach, describe, expect, it } from 'vitest';
import type { Customer } from '../entities/customer.js';
import {
  JAN_1_2013,
  type TestBilling,
  cardSource,
  chargePayload,
  createTestBilling,
  eventPayload,
  subscriptionPayload,
  webhookBody,
} from '../testing/index.js';

const invoiceObject = (overrides: Record<string, unknown> = {}) => ({
  id: 'in_1',
  object: 'invoice',
  customer: 'cus_1',
  amount_due: 999,
  subtotal: 999,
  total: 999,
  currency: 'usd',
  paid: false,
  date: JAN_1_2013,
  lines: { object: 'list', data: [] },
  ...overrides,
});

describe('EventProcessor', () => {
  let t: TestBilling;
  let customer: Customer;

  /** Post a webhook the processor also knows about. */
  const deliver = (body: Record<string, unknown>) => {
    t.gateway.events.set(String(body['id']), eventPayload(body));
    return t.billing.events.receiveWebhook(body);
  };

  beforeEach(async () => {
    t = createTestBilling();
    customer = await t.store.customers.upsert({
      stripeId: 'cus_1',
      userId: 'user-1',
      email: 'member@example.test',
    });
  });

  describe('receiveWebhook', () => {
    it('records, validates, links and processes a new event', async () => {
      const receipt = await deliver(webhookBody('invoice.created', invoiceObject()));

      expect(receipt.duplicate).toBe(false);
      expect(receipt.event).toMatchObject({
        stripeId: 'evt_1',
        kind: 'invoice.created',
        livemode: false,
        request: 'req_1',
        apiVersion: '2017-08-15',
        pendingWebhooks: 1,
        valid: true,
        processed: true,
        customerId: customer.id,
      });
      expect(t.store.invoiceRows.map((i) => i.stripeId)).toEqual(['in_1']);
    });

    it('logs a duplicate delivery instead of storing it twice', async () => {
      const body = webhookBody('invoice.created', invoiceObject());
      await deliver(body);

      const again = await deliver(body);

      expect(again).toEqual({ duplicate: true, event: null });
      expect(t.store.eventRows).toHaveLength(1);
      expect(t.store.exceptionRows).toMatchObject([
        { eventId: null, message: 'Duplicate event record', data: body },
      ]);
    });

    it('rejects a body that is not an event', async () => {
      await expect(t.billing.events.receiveWebhook({ id: 'evt_1' })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(t.billing.events.receiveWebhook('nope')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('validateEvent', () => {
    it('marks an event invalid when the processor copy differs', async () => {
      const body = webhookBody('invoice.created', invoiceObject());
      t.gateway.events.set(
        'evt_1',
        eventPayload(webhookBody('invoice.created', invoiceObject({ total: 1 }))),
      );

      const { event } = await t.billing.events.receiveWebhook(body);

      expect(event).toMatchObject({ valid: false, processed: false });
      expect(event?.validatedMessage).not.toBeNull();
      expect(t.store.invoiceRows).toEqual([]);
    });

    it('marks an event invalid when the processor does not know it', async () => {
      const { event } = await t.billing.events.receiveWebhook(
        webhookBody('invoice.created', invoiceObject()),
      );

      expect(event).toMatchObject({ valid: false, retryValidation: false, processed: false });
      expect(t.store.exceptionRows).toMatchObject([
        { eventId: event?.id, message: 'No such event: evt_1' },
      ]);
      expect(await t.billing.events.processPending()).toBe(0);
    });

    it('validates again later when the processor could not be reached', async () => {
      const body = webhookBody('invoice.created', invoiceObject());
      t.gateway.failNext('retrieveEvent', new Error('socket hang up'));

      const { event } = await deliver(body);

      expect(event).toMatchObject({ valid: false, retryValidation: true, processed: false });
      expect(t.store.invoiceRows).toEqual([]);

      expect(await t.billing.events.receiveWebhook(body)).toEqual({
        duplicate: true,
        event: null,
      });
      expect(await t.billing.events.processPending()).toBe(1);
      expect(await t.store.events.findById(event?.id ?? '')).toMatchObject({
        valid: true,
        retryValidation: false,
        processed: true,
      });
      expect(t.store.invoiceRows.map((i) => i.stripeId)).toEqual(['in_1']);
      expect(t.store.exceptionRows.map((x) => x.message)).toEqual([
        'socket hang up',
        'Duplicate event record',
      ]);
    });
  });

  describe('processEvent', () => {
    it('records a failure and keeps the event for a retry', async () => {
      const { event } = await deliver(
        webhookBody('invoice.payment_failed', invoiceObject({ customer: 'cus_late' })),
      );

      expect(event).toMatchObject({ valid: true, processed: false, customerId: null });
      expect(t.store.exceptionRows).toMatchObject([
        { eventId: event?.id, message: 'Customer cus_late not found' },
      ]);

      await t.store.customers.upsert({ stripeId: 'cus_late' });
      const retried = await t.billing.events.reprocessEvent(event?.id ?? '');

      expect(retried?.processed).toBe(true);
      expect(t.store.invoiceRows).toHaveLength(1);
    });

    it('retries pending events in bulk', async () => {
      await deliver(webhookBody('invoice.updated', invoiceObject({ customer: 'cus_late' })));
      expect(await t.billing.events.processPending()).toBe(0);

      await t.store.customers.upsert({ stripeId: 'cus_late' });
      expect(await t.billing.events.processPending()).toBe(1);
      expect(await t.billing.events.processPending()).toBe(0);
    });

    it('validates again before reprocessing', async () => {
      const { event } = await deliver(
        webhookBody('invoice.updated', invoiceObject({ customer: 'cus_late' })),
      );
      expect(event).toMatchObject({ valid: true, processed: false });

      t.gateway.events.set(
        'evt_1',
        eventPayload(
          webhookBody('invoice.updated', invoiceObject({ customer: 'cus_late', total: 1 })),
        ),
      );
      await t.store.customers.upsert({ stripeId: 'cus_late' });
      const retried = await t.billing.events.reprocessEvent(event?.id ?? '');

      expect(retried).toMatchObject({ valid: false, processed: false });
      expect(t.gateway.callsTo('retrieveEvent')).toEqual([['evt_1'], ['evt_1']]);
      expect(t.store.invoiceRows).toEqual([]);
    });

    it('returns null when reprocessing an unknown event', async () => {
      const missing = await t.billing.events.reprocessEvent('00000000-0000-0000-0000-000000000000');
      expect(missing).toBeNull();
    });

    it('syncs the charge named by a charge event', async () => {
      t.gateway.charges.set('ch_1', chargePayload());
      await deliver(
        webhookBody('charge.succeeded', { id: 'ch_1', object: 'charge', customer: 'cus_1' }),
      );

      expect(await t.store.charges.findByStripeId('ch_1')).toMatchObject({
        customerId: customer.id,
        amount: 999,
        paid: true,
      });
    });

    it('re-syncs the subscriptions of the linked customer', async () => {
      t.gateway.subscriptions.set('sub_1', subscriptionPayload());
      await deliver(
        webhookBody('customer.subscription.updated', {
          id: 'sub_1',
          object: 'subscription',
          customer: 'cus_1',
        }),
      );

      expect(await t.store.subscriptions.listByCustomer(customer.id)).toMatchObject([
        { stripeId: 'sub_1', status: 'active' },
      ]);
    });

    it('links customer.created events through the object id', async () => {
      const { event } = await deliver(
        webhookBody('customer.created', {
          id: 'cus_1',
          object: 'customer',
          email: 'new@example.test',
        }),
      );

      expect(event?.customerId).toBe(customer.id);
      expect((await t.store.customers.findById(customer.id))?.email).toBe('new@example.test');
    });

    it('purges a deleted customer', async () => {
      await deliver(
        webhookBody('customer.deleted', { id: 'cus_1', object: 'customer', deleted: true }),
      );

      const purged = await t.store.customers.findById(customer.id);
      expect(purged?.userId).toBeNull();
      expect(purged?.purgedAt).toBeInstanceOf(Date);
    });

    it('mirrors created plans and ignores deleted ones', async () => {
      const plan = {
        id: 'plan_lite',
        object: 'plan',
        amount: 500,
        currency: 'usd',
        interval: 'month',
        name: 'Lite',
      };
      await deliver(webhookBody('plan.deleted', plan));
      expect(t.store.planRows).toEqual([]);

      await deliver(webhookBody('plan.created', plan, { id: 'evt_2' }));
      expect(t.store.planRows).toMatchObject([{ stripeId: 'plan_lite', amount: 500 }]);
    });

    it('refreshes card details on customer.updated', async () => {
      await deliver(
        webhookBody('customer.updated', {
          id: 'cus_1',
          object: 'customer',
          email: 'member@example.test',
          default_source: cardSource(),
        }),
      );

      expect(await t.store.customers.findById(customer.id)).toMatchObject({
        cardFingerprint: 'fp_test',
        cardLast4: '4242',
        cardKind: 'Visa',
      });
    });

    it('mirrors transfers with the event that announced them', async () => {
      const { event } = await deliver(
        webhookBody('transfer.paid', {
          id: 'tr_1',
          object: 'transfer',
          amount: 455,
          currency: 'usd',
          status: 'paid',
          date: JAN_1_2013,
        }),
      );

      expect(event?.processed).toBe(true);
      expect(t.store.transferRows).toMatchObject([
        { stripeId: 'tr_1', amount: 455, status: 'paid', eventId: event?.id },
      ]);
    });

    it('mirrors created products and their SKUs', async () => {
      await deliver(
        webhookBody('product.created', { id: 'prod_book', object: 'product', name: 'Field guide' }),
      );
      await deliver(
        webhookBody(
          'sku.created',
          {
            id: 'sku_book',
            object: 'sku',
            product: 'prod_book',
            price: 1500,
            currency: 'usd',
            inventory: { type: 'finite', quantity: 10 },
          },
          { id: 'evt_2' },
        ),
      );

      expect(t.store.productRows).toMatchObject([{ stripeId: 'prod_book', name: 'Field guide' }]);
      expect(t.store.skuRows).toMatchObject([
        { stripeId: 'sku_book', productId: t.store.productRows[0]?.id, price: 1500 },
      ]);
    });

    it('ignores deleted invoices, products and SKUs', async () => {
      const deliveries = [
        webhookBody('invoice.deleted', invoiceObject()),
        webhookBody(
          'product.deleted',
          { id: 'prod_book', object: 'product', name: 'Field guide' },
          { id: 'evt_2' },
        ),
        webhookBody(
          'sku.deleted',
          {
            id: 'sku_book',
            object: 'sku',
            product: 'prod_book',
            price: 1500,
            currency: 'usd',
            inventory: { type: 'finite' },
          },
          { id: 'evt_3' },
        ),
      ];

      for (const body of deliveries) {
        const { event } = await deliver(body);
        expect(event?.processed).toBe(true);
      }
      expect(t.store.invoiceRows).toEqual([]);
      expect(t.store.productRows).toEqual([]);
      expect(t.store.skuRows).toEqual([]);
      expect(t.store.exceptionRows).toEqual([]);
    });

    it('marks unhandled kinds processed', async () => {
      const { event } = await deliver(webhookBody('balance.available', { object: 'balance' }));
      expect(event?.processed).toBe(true);
      expect(t.store.exceptionRows).toEqual([]);
    });
  });
});
