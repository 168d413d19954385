import { z } from 'zod';

// ---------------------------------------------------------------------------
// Payloads read from the payment processor.
//
// Only the fields the mirror stores are declared; everything else passes
// through untouched so the raw payload can still be logged or stored.
// Timestamps are unix seconds.
// ---------------------------------------------------------------------------

const unixTime = z.number().int().nullable().optional();
const metadata = z.record(z.string()).nullish().transform((m) => m ?? {});

export const ProcessorTierSchema = z.object({
  amount: z.number().int().nullish(),
  unit_amount: z.number().int().nullish(),
  flat_amount: z.number().int().nullish(),
  up_to: z.number().int().nullable(),
});

export const ProcessorPlanSchema = z
  .object({
    id: z.string(),
    amount: z.number().int().nullable(),
    currency: z.string().nullable(),
    interval: z.string(),
    interval_count: z.number().int().default(1),
    name: z.string().nullish(),
    nickname: z.string().nullish(),
    statement_descriptor: z.string().nullish(),
    trial_period_days: z.number().int().nullish(),
    metadata,
    billing_scheme: z.string().nullish(),
    tiers_mode: z.string().nullish(),
    tiers: z.array(ProcessorTierSchema).nullish(),
    deleted: z.boolean().optional(),
  })
  .passthrough();

export type ProcessorPlan = z.infer<typeof ProcessorPlanSchema>;
export type ProcessorTier = z.infer<typeof ProcessorTierSchema>;

export const ProcessorProductSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullish(),
    active: z.boolean().default(true),
    attributes: z.array(z.string()).nullish(),
    metadata,
    livemode: z.boolean().default(false),
    updated: unixTime,
  })
  .passthrough();

export type ProcessorProduct = z.infer<typeof ProcessorProductSchema>;

export const SkuInventorySchema = z.object({
  type: z.string(),
  quantity: z.number().int().nullish(),
  value: z.string().nullish(),
});

export const PackageDimensionsSchema = z.object({
  height: z.number(),
  length: z.number(),
  weight: z.number(),
  width: z.number(),
});

export const ProcessorSkuSchema = z
  .object({
    id: z.string(),
    product: z.string(),
    price: z.number().int(),
    currency: z.string(),
    attributes: metadata,
    image: z.string().nullish(),
    inventory: SkuInventorySchema,
    livemode: z.boolean().default(false),
    metadata,
    package_dimensions: PackageDimensionsSchema.nullish(),
    active: z.boolean().default(true),
    updated: unixTime,
  })
  .passthrough();

export type ProcessorSku = z.infer<typeof ProcessorSkuSchema>;

export const ProcessorCardSchema = z
  .object({
    id: z.string(),
    fingerprint: z.string().nullish(),
    last4: z.string().nullish(),
    brand: z.string().nullish(),
  })
  .passthrough();

export type ProcessorCard = z.infer<typeof ProcessorCardSchema>;

export const ProcessorCustomerSchema = z
  .object({
    id: z.string(),
    email: z.string().nullish(),
    deleted: z.boolean().optional(),
    default_source: z.union([z.string(), ProcessorCardSchema]).nullish(),
    sources: z.object({ data: z.array(z.unknown()) }).nullish(),
  })
  .passthrough();

export type ProcessorCustomer = z.infer<typeof ProcessorCustomerSchema>;

const SubscriptionPlanRefSchema = z
  .object({
    id: z.string(),
    amount: z.number().int().nullish(),
  })
  .passthrough();

export const ProcessorSubscriptionSchema = z
  .object({
    id: z.string(),
    customer: z.string(),
    status: z.string(),
    quantity: z.number().int().nullish(),
    plan: SubscriptionPlanRefSchema.nullish(),
    items: z
      .object({
        data: z.array(
          z
            .object({
              id: z.string(),
              plan: SubscriptionPlanRefSchema.nullish(),
              quantity: z.number().int().nullish(),
              current_period_start: unixTime,
              current_period_end: unixTime,
            })
            .passthrough(),
        ),
      })
      .nullish(),
    start: unixTime,
    start_date: unixTime,
    current_period_start: unixTime,
    current_period_end: unixTime,
    cancel_at_period_end: z.boolean().default(false),
    canceled_at: unixTime,
    ended_at: unixTime,
    trial_start: unixTime,
    trial_end: unixTime,
  })
  .passthrough();

export type ProcessorSubscription = z.infer<typeof ProcessorSubscriptionSchema>;

export const ProcessorChargeSchema = z
  .object({
    id: z.string(),
    customer: z.string().nullish(),
    invoice: z.string().nullish(),
    source: z.object({ id: z.string() }).passthrough().nullish(),
    payment_method: z.string().nullish(),
    currency: z.string(),
    amount: z.number().int(),
    amount_refunded: z.number().int().default(0),
    description: z.string().nullish(),
    paid: z.boolean().default(false),
    disputed: z.boolean().default(false),
    refunded: z.boolean().default(false),
    captured: z.boolean().default(false),
    created: unixTime,
  })
  .passthrough();

export type ProcessorCharge = z.infer<typeof ProcessorChargeSchema>;

export const ProcessorInvoiceLineSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    amount: z.number().int(),
    currency: z.string(),
    proration: z.boolean().default(false),
    description: z.string().nullish(),
    period: z.object({ start: unixTime, end: unixTime }),
    plan: z.object({ id: z.string() }).passthrough().nullish(),
    quantity: z.number().int().nullish(),
    subscription: z.string().nullish(),
  })
  .passthrough();

export type ProcessorInvoiceLine = z.infer<typeof ProcessorInvoiceLineSchema>;

export const ProcessorInvoiceSchema = z
  .object({
    id: z.string(),
    customer: z.string(),
    subscription: z.string().nullish(),
    charge: z.string().nullish(),
    attempted: z.boolean().default(false),
    attempt_count: z.number().int().default(0),
    amount_due: z.number().int(),
    closed: z.boolean().default(false),
    paid: z.boolean().default(false),
    period_start: unixTime,
    period_end: unixTime,
    subtotal: z.number().int(),
    tax: z.number().int().nullish(),
    tax_percent: z.number().nullish(),
    total: z.number().int(),
    currency: z.string(),
    metadata,
    date: unixTime,
    created: unixTime,
    receipt_number: z.string().nullish(),
    lines: z
      .object({ data: z.array(ProcessorInvoiceLineSchema).nullish() })
      .nullish()
      .transform((lines) => ({ data: lines?.data ?? [] })),
  })
  .passthrough();

export type ProcessorInvoice = z.infer<typeof ProcessorInvoiceSchema>;

export const ProcessorFeeDetailSchema = z
  .object({
    amount: z.number().int(),
    application: z.string().nullish(),
    currency: z.string(),
    description: z.string().nullish(),
    type: z.string(),
  })
  .passthrough();

const optionalInt = z.number().int().nullish();

export const ProcessorTransferSummarySchema = z
  .object({
    adjustment_count: optionalInt,
    adjustment_fees: optionalInt,
    adjustment_gross: optionalInt,
    charge_count: optionalInt,
    charge_fees: optionalInt,
    charge_fee_details: z.array(ProcessorFeeDetailSchema).nullish(),
    charge_gross: optionalInt,
    collected_fee_count: optionalInt,
    collected_fee_gross: optionalInt,
    net: optionalInt,
    refund_count: optionalInt,
    refund_fees: optionalInt,
    refund_gross: optionalInt,
    validation_count: optionalInt,
    validation_fees: optionalInt,
  })
  .passthrough();

export const ProcessorTransferSchema = z
  .object({
    id: z.string(),
    amount: z.number().int(),
    currency: z.string(),
    status: z.string().default('paid'),
    date: unixTime,
    created: unixTime,
    description: z.string().nullish(),
    summary: ProcessorTransferSummarySchema.nullish(),
  })
  .passthrough();

export type ProcessorTransfer = z.infer<typeof ProcessorTransferSchema>;

export const ProcessorEventSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    livemode: z.boolean().default(false),
    api_version: z.string().nullish(),
    pending_webhooks: z.number().int().default(0),
    request: z
      .union([z.string(), z.object({ id: z.string().nullish() }).passthrough()])
      .nullish(),
    created: unixTime,
    data: z
      .object({
        object: z.record(z.unknown()),
        previous_attributes: z.record(z.unknown()).nullish(),
      })
      .passthrough(),
  })
  .passthrough();

export type ProcessorEvent = z.infer<typeof ProcessorEventSchema>;

/** Request id of an event, whichever shape the API version uses. */
export function eventRequestId(event: ProcessorEvent): string {
  const { request } = event;
  if (!request) return '';
  if (typeof request === 'string') return request;
  return request.id ?? '';
}
