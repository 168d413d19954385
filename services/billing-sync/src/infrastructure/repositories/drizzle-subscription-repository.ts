import type {
  Subscription,
  SubscriptionRepository,
  SubscriptionValues,
} from '@billmirror/billing-domain';
import { subscriptions } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { asc, eq } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleSubscriptionRepository implements SubscriptionRepository {
  constructor(private readonly db: Database) {}

  async upsert(values: SubscriptionValues): Promise<Subscription> {
    const rows = await this.db
      .insert(subscriptions)
      .values(values)
      .onConflictDoUpdate({
        target: subscriptions.stripeId,
        set: { ...values, updatedAt: new Date() },
      })
      .returning();
    return single(rows, 'Subscription', values.stripeId);
  }

  async findById(id: string): Promise<Subscription | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.id, id))
      .limit(1);
    return row ?? null;
  }

  async findByStripeId(stripeId: string): Promise<Subscription | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.stripeId, stripeId))
      .limit(1);
    return row ?? null;
  }

  async listByCustomer(customerId: string): Promise<Subscription[]> {
    return this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.customerId, customerId))
      .orderBy(asc(subscriptions.start));
  }

  async update(id: string, patch: Partial<SubscriptionValues>): Promise<Subscription> {
    const rows = await this.db
      .update(subscriptions)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(subscriptions.id, id))
      .returning();
    return single(rows, 'Subscription', id);
  }
}
