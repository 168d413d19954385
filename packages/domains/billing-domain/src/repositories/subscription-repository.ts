import type { Subscription, SubscriptionValues } from '../entities/subscription.js';

export interface SubscriptionRepository {
  upsert(values: SubscriptionValues): Promise<Subscription>;
  findById(id: string): Promise<Subscription | null>;
  findByStripeId(stripeId: string): Promise<Subscription | null>;
  listByCustomer(customerId: string): Promise<Subscription[]>;
  update(id: string, patch: Partial<SubscriptionValues>): Promise<Subscription>;
}
