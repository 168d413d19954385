import type { eventProcessingExceptions, events } from '../../drizzle/schema.js';

export type BillingEvent = typeof events.$inferSelect;
export type BillingEventValues = Omit<typeof events.$inferInsert, 'id' | 'createdAt'>;

export type EventProcessingException = typeof eventProcessingExceptions.$inferSelect;
export type EventProcessingExceptionValues = Omit<
  typeof eventProcessingExceptions.$inferInsert,
  'id' | 'createdAt'
>;

/** Dispatch families, derived from the event kind prefix. */
export type EventFamily =
  | 'invoice'
  | 'charge'
  | 'transfer'
  | 'subscription'
  | 'customer'
  | 'plan'
  | 'product'
  | 'sku'
  | 'other';

export function eventFamily(kind: string): EventFamily {
  if (kind.startsWith('invoice.')) return 'invoice';
  if (kind.startsWith('charge.')) return 'charge';
  if (kind.startsWith('transfer.')) return 'transfer';
  if (kind.startsWith('customer.subscription.')) return 'subscription';
  if (kind.startsWith('customer.') && !kind.startsWith('customer.source.')) {
    return 'customer';
  }
  if (kind.startsWith('plan.')) return 'plan';
  if (kind.startsWith('product.')) return 'product';
  if (kind.startsWith('sku.')) return 'sku';
  return 'other';
}
