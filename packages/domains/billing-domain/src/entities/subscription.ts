import { z } from 'zod';
import type { subscriptions } from '../../drizzle/schema.js';

export const SubscriptionStatusSchema = z.enum([
  'incomplete',
  'incomplete_expired',
  'trialing',
  'active',
  'past_due',
  'unpaid',
  'canceled',
  'paused',
]);

export type SubscriptionStatus = z.infer<typeof SubscriptionStatusSchema>;

/** Statuses that count a customer as active in reports. */
export const ACTIVE_STATUSES: readonly SubscriptionStatus[] = [
  'trialing',
  'active',
  'past_due',
  'unpaid',
];

export type Subscription = typeof subscriptions.$inferSelect;
export type SubscriptionValues = Omit<
  typeof subscriptions.$inferInsert,
  'id' | 'createdAt' | 'updatedAt'
>;

export function isActiveStatus(status: string): boolean {
  return ACTIVE_STATUSES.some((s) => s === status);
}

/** Whether the subscription is in a state the processor will still bill. */
export function isLiveSubscription(subscription: Pick<Subscription, 'status' | 'endedAt'>): boolean {
  return subscription.endedAt === null && isActiveStatus(subscription.status);
}
