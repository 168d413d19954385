import {
  boolean,
  index,
  integer,
  jsonb,
  numeric,
  pgSchema,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

export const billingSchema = pgSchema('billing');

export type Metadata = Record<string, string>;

export interface SkuInventory {
  type: string; // finite, bucket, infinite
  quantity?: number | null;
  value?: string | null; // in_stock, limited, out_of_stock
}

export interface PackageDimensions {
  height: number;
  length: number;
  weight: number;
  width: number;
}

// ---------------------------------------------------------------------------
// Customers
// ---------------------------------------------------------------------------

export const customers = billingSchema.table('customers', {
  id: uuid('id').primaryKey().defaultRandom(),
  stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
  userId: varchar('user_id', { length: 255 }).unique(),
  email: varchar('email', { length: 255 }),
  cardFingerprint: varchar('card_fingerprint', { length: 200 }).default('').notNull(),
  cardLast4: varchar('card_last_4', { length: 4 }).default('').notNull(),
  cardKind: varchar('card_kind', { length: 50 }).default('').notNull(),
  purgedAt: timestamp('purged_at'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// ---------------------------------------------------------------------------
// Catalog: plans, tiers, products, SKUs
// ---------------------------------------------------------------------------

export const plans = billingSchema.table('plans', {
  id: uuid('id').primaryKey().defaultRandom(),
  stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
  name: varchar('name', { length: 150 }).notNull(),
  amount: integer('amount'), // minor units; null for tiered plans
  currency: varchar('currency', { length: 15 }).notNull(),
  interval: varchar('interval', { length: 15 }).notNull(), // day, week, month, year
  intervalCount: integer('interval_count').default(1).notNull(),
  statementDescriptor: text('statement_descriptor').default('').notNull(),
  trialPeriodDays: integer('trial_period_days'),
  metadata: jsonb('metadata').$type<Metadata>().default({}).notNull(),
  billingScheme: varchar('billing_scheme', { length: 15 }),
  tiersMode: varchar('tiers_mode', { length: 15 }),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const tiers = billingSchema.table('tiers', {
  id: uuid('id').primaryKey().defaultRandom(),
  planId: uuid('plan_id').notNull().references(() => plans.id, { onDelete: 'cascade' }),
  amount: integer('amount'),
  flatAmount: integer('flat_amount'),
  upTo: integer('up_to'), // null = infinity
});

export const products = billingSchema.table('products', {
  id: uuid('id').primaryKey().defaultRandom(),
  stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
  name: varchar('name', { length: 255 }).notNull(),
  description: text('description').default('').notNull(),
  active: boolean('active').default(true).notNull(),
  attributes: jsonb('attributes').$type<string[]>().default([]).notNull(),
  metadata: jsonb('metadata').$type<Metadata>().default({}).notNull(),
  livemode: boolean('livemode').default(false).notNull(),
  updated: timestamp('updated'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

export const skus = billingSchema.table('skus', {
  id: uuid('id').primaryKey().defaultRandom(),
  stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
  productId: uuid('product_id').notNull().references(() => products.id),
  price: integer('price').notNull(), // minor units
  currency: varchar('currency', { length: 15 }).notNull(),
  attributes: jsonb('attributes').$type<Metadata>().default({}).notNull(),
  image: varchar('image', { length: 2048 }).default('').notNull(),
  inventory: jsonb('inventory').$type<SkuInventory>().notNull(),
  livemode: boolean('livemode').default(false).notNull(),
  metadata: jsonb('metadata').$type<Metadata>().default({}).notNull(),
  packageDimensions: jsonb('package_dimensions').$type<PackageDimensions>(),
  active: boolean('active').default(true).notNull(),
  updated: timestamp('updated'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

// ---------------------------------------------------------------------------
// Subscriptions and charges
// ---------------------------------------------------------------------------

export const subscriptions = billingSchema.table(
  'subscriptions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
    customerId: uuid('customer_id').notNull().references(() => customers.id),
    planId: uuid('plan_id').references(() => plans.id),
    status: varchar('status', { length: 25 }).notNull(), // trialing, active, past_due, unpaid, canceled, ...
    quantity: integer('quantity').default(1).notNull(),
    amount: integer('amount'),
    start: timestamp('start').notNull(),
    currentPeriodStart: timestamp('current_period_start'),
    currentPeriodEnd: timestamp('current_period_end'),
    cancelAtPeriodEnd: boolean('cancel_at_period_end').default(false).notNull(),
    canceledAt: timestamp('canceled_at'),
    endedAt: timestamp('ended_at'),
    trialStart: timestamp('trial_start'),
    trialEnd: timestamp('trial_end'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    byCustomer: index('subscriptions_customer_idx').on(table.customerId),
    byStatusStart: index('subscriptions_status_start_idx').on(table.status, table.start),
  }),
);

export const charges = billingSchema.table('charges', {
  id: uuid('id').primaryKey().defaultRandom(),
  stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
  customerId: uuid('customer_id').references(() => customers.id),
  invoiceId: uuid('invoice_id'),
  source: varchar('source', { length: 255 }).default('').notNull(),
  currency: varchar('currency', { length: 15 }).notNull(),
  amount: integer('amount').notNull(),
  amountRefunded: integer('amount_refunded').default(0).notNull(),
  description: text('description').default('').notNull(),
  paid: boolean('paid').default(false).notNull(),
  disputed: boolean('disputed').default(false).notNull(),
  refunded: boolean('refunded').default(false).notNull(),
  captured: boolean('captured').default(false).notNull(),
  receiptSent: boolean('receipt_sent').default(false).notNull(),
  chargeCreated: timestamp('charge_created'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

// ---------------------------------------------------------------------------
// Invoices
// ---------------------------------------------------------------------------

export const invoices = billingSchema.table(
  'invoices',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
    customerId: uuid('customer_id').notNull().references(() => customers.id),
    subscriptionId: uuid('subscription_id').references(() => subscriptions.id),
    chargeId: uuid('charge_id').references(() => charges.id),
    attempted: boolean('attempted').default(false).notNull(),
    attemptCount: integer('attempt_count').default(0).notNull(),
    amountDue: integer('amount_due').notNull(),
    closed: boolean('closed').default(false).notNull(),
    paid: boolean('paid').default(false).notNull(),
    periodStart: timestamp('period_start'),
    periodEnd: timestamp('period_end'),
    subtotal: integer('subtotal').notNull(),
    tax: integer('tax'),
    taxPercent: numeric('tax_percent', { precision: 7, scale: 4 }),
    total: integer('total').notNull(),
    currency: varchar('currency', { length: 15 }).notNull(),
    metadata: jsonb('metadata').$type<Metadata>().default({}).notNull(),
    date: timestamp('date'),
    receiptNumber: varchar('receipt_number', { length: 64 }).default('').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    byCustomer: index('invoices_customer_idx').on(table.customerId),
  }),
);

export const invoiceItems = billingSchema.table(
  'invoice_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    stripeId: varchar('stripe_id', { length: 255 }).notNull(),
    invoiceId: uuid('invoice_id').notNull().references(() => invoices.id, { onDelete: 'cascade' }),
    amount: integer('amount').notNull(),
    currency: varchar('currency', { length: 15 }).notNull(),
    proration: boolean('proration').default(false).notNull(),
    description: text('description').default('').notNull(),
    lineType: varchar('line_type', { length: 50 }).notNull(), // subscription, invoiceitem
    planId: uuid('plan_id').references(() => plans.id),
    subscriptionId: uuid('subscription_id').references(() => subscriptions.id),
    periodStart: timestamp('period_start'),
    periodEnd: timestamp('period_end'),
    quantity: integer('quantity'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    invoiceStripeIdx: uniqueIndex('invoice_items_invoice_stripe_idx').on(
      table.invoiceId,
      table.stripeId,
    ),
  }),
);

// ---------------------------------------------------------------------------
// Webhook events
// ---------------------------------------------------------------------------

export const events = billingSchema.table(
  'events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
    kind: varchar('kind', { length: 250 }).notNull(),
    livemode: boolean('livemode').default(false).notNull(),
    customerId: uuid('customer_id').references(() => customers.id),
    webhookMessage: jsonb('webhook_message').$type<Record<string, unknown>>().notNull(),
    validatedMessage: jsonb('validated_message').$type<Record<string, unknown>>(),
    valid: boolean('valid'),
    /** Validation failed for a reason that may clear up, such as a timeout. */
    retryValidation: boolean('retry_validation').default(false).notNull(),
    processed: boolean('processed').default(false).notNull(),
    request: varchar('request', { length: 100 }).default('').notNull(),
    pendingWebhooks: integer('pending_webhooks').default(0).notNull(),
    apiVersion: varchar('api_version', { length: 100 }).default('').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    unprocessedIdx: index('events_processed_created_idx').on(table.processed, table.createdAt),
  }),
);

export const eventProcessingExceptions = billingSchema.table('event_processing_exceptions', {
  id: uuid('id').primaryKey().defaultRandom(),
  eventId: uuid('event_id').references(() => events.id),
  data: jsonb('data').$type<unknown>(),
  message: text('message').notNull(),
  traceback: text('traceback').default('').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

// ---------------------------------------------------------------------------
// Transfers
// ---------------------------------------------------------------------------

export const transfers = billingSchema.table(
  'transfers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    stripeId: varchar('stripe_id', { length: 255 }).notNull().unique(),
    eventId: uuid('event_id').references(() => events.id),
    amount: integer('amount').notNull(),
    currency: varchar('currency', { length: 15 }).notNull(),
    status: varchar('status', { length: 25 }).notNull(),
    date: timestamp('date').notNull(),
    description: text('description').default('').notNull(),
    adjustmentCount: integer('adjustment_count'),
    adjustmentFees: integer('adjustment_fees'),
    adjustmentGross: integer('adjustment_gross'),
    chargeCount: integer('charge_count'),
    chargeFees: integer('charge_fees'),
    chargeGross: integer('charge_gross'),
    collectedFeeCount: integer('collected_fee_count'),
    collectedFeeGross: integer('collected_fee_gross'),
    net: integer('net'),
    refundCount: integer('refund_count'),
    refundFees: integer('refund_fees'),
    refundGross: integer('refund_gross'),
    validationCount: integer('validation_count'),
    validationFees: integer('validation_fees'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    byStatusDate: index('transfers_status_date_idx').on(table.status, table.date),
  }),
);

export const transferChargeFees = billingSchema.table('transfer_charge_fees', {
  id: uuid('id').primaryKey().defaultRandom(),
  transferId: uuid('transfer_id').notNull().references(() => transfers.id, { onDelete: 'cascade' }),
  amount: integer('amount').notNull(),
  currency: varchar('currency', { length: 15 }).notNull(),
  application: text('application').default('').notNull(),
  description: text('description').default('').notNull(),
  kind: varchar('kind', { length: 150 }).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
