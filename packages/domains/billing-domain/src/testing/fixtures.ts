import {
  type ProcessorCharge,
  ProcessorChargeSchema,
  type ProcessorCustomer,
  ProcessorCustomerSchema,
  type ProcessorEvent,
  ProcessorEventSchema,
  type ProcessorInvoice,
  ProcessorInvoiceSchema,
  type ProcessorPlan,
  ProcessorPlanSchema,
  type ProcessorProduct,
  ProcessorProductSchema,
  type ProcessorSku,
  ProcessorSkuSchema,
  type ProcessorSubscription,
  ProcessorSubscriptionSchema,
  type ProcessorTransfer,
  ProcessorTransferSchema,
} from '../processor/payloads.js';

// Payload builders. Overrides are merged over a minimal valid payload and
// run through the same schemas the gateway adapter uses.

type Overrides = Record<string, unknown>;

/** 2013-01-01T00:00:00Z */
export const JAN_1_2013 = 1356998400;

export function planPayload(overrides: Overrides = {}): ProcessorPlan {
  return ProcessorPlanSchema.parse({
    id: 'plan_pro',
    amount: 999,
    currency: 'usd',
    interval: 'month',
    interval_count: 1,
    name: 'Pro',
    metadata: {},
    ...overrides,
  });
}

export function productPayload(overrides: Overrides = {}): ProcessorProduct {
  return ProcessorProductSchema.parse({
    id: 'prod_book',
    name: 'Field guide',
    active: true,
    livemode: false,
    ...overrides,
  });
}

export function skuPayload(overrides: Overrides = {}): ProcessorSku {
  return ProcessorSkuSchema.parse({
    id: 'sku_book',
    product: 'prod_book',
    price: 1500,
    currency: 'usd',
    inventory: { type: 'finite', quantity: 10 },
    ...overrides,
  });
}

export function cardSource(overrides: Overrides = {}): Overrides {
  return {
    id: 'card_1',
    object: 'card',
    fingerprint: 'fp_test',
    last4: '4242',
    brand: 'Visa',
    ...overrides,
  };
}

export function customerPayload(overrides: Overrides = {}): ProcessorCustomer {
  return ProcessorCustomerSchema.parse({
    id: 'cus_1',
    email: 'member@example.test',
    default_source: null,
    sources: { data: [] },
    ...overrides,
  });
}

export function subscriptionPayload(overrides: Overrides = {}): ProcessorSubscription {
  return ProcessorSubscriptionSchema.parse({
    id: 'sub_1',
    customer: 'cus_1',
    status: 'active',
    quantity: 1,
    plan: { id: 'plan_pro', amount: 999 },
    start: JAN_1_2013,
    current_period_start: JAN_1_2013,
    current_period_end: JAN_1_2013 + 31 * 86400,
    cancel_at_period_end: false,
    ...overrides,
  });
}

export function chargePayload(overrides: Overrides = {}): ProcessorCharge {
  return ProcessorChargeSchema.parse({
    id: 'ch_1',
    customer: 'cus_1',
    currency: 'usd',
    amount: 999,
    paid: true,
    captured: true,
    source: { id: 'card_1' },
    created: JAN_1_2013,
    ...overrides,
  });
}

export function invoiceLine(overrides: Overrides = {}): Overrides {
  return {
    id: 'ii_1',
    type: 'invoiceitem',
    amount: 999,
    currency: 'usd',
    proration: false,
    description: 'Line item',
    period: { start: JAN_1_2013, end: JAN_1_2013 + 31 * 86400 },
    ...overrides,
  };
}

export function invoicePayload(overrides: Overrides = {}): ProcessorInvoice {
  return ProcessorInvoiceSchema.parse({
    id: 'in_1',
    customer: 'cus_1',
    attempted: false,
    attempt_count: 0,
    amount_due: 999,
    closed: false,
    paid: false,
    period_start: JAN_1_2013,
    period_end: JAN_1_2013 + 31 * 86400,
    subtotal: 999,
    total: 999,
    currency: 'usd',
    date: JAN_1_2013,
    lines: { data: [] },
    ...overrides,
  });
}

export function transferPayload(overrides: Overrides = {}): ProcessorTransfer {
  return ProcessorTransferSchema.parse({
    id: 'tr_1',
    amount: 455,
    currency: 'usd',
    status: 'paid',
    date: JAN_1_2013,
    description: 'Payout',
    ...overrides,
  });
}

/** A raw webhook body, as the processor posts it. */
export function webhookBody(
  type: string,
  object: Overrides,
  overrides: Overrides = {},
): Record<string, unknown> {
  return {
    id: 'evt_1',
    object: 'event',
    type,
    livemode: false,
    api_version: '2017-08-15',
    pending_webhooks: 1,
    request: 'req_1',
    created: JAN_1_2013,
    data: { object },
    ...overrides,
  };
}

export function eventPayload(body: Record<string, unknown>): ProcessorEvent {
  return ProcessorEventSchema.parse(body);
}
