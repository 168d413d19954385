import type { Customer, CustomerRepository, CustomerValues } from '@billmirror/billing-domain';
import { customers } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { eq } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleCustomerRepository implements CustomerRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<Customer | null> {
    const [row] = await this.db.select().from(customers).where(eq(customers.id, id)).limit(1);
    return row ?? null;
  }

  async findByStripeId(stripeId: string): Promise<Customer | null> {
    const [row] = await this.db
      .select()
      .from(customers)
      .where(eq(customers.stripeId, stripeId))
      .limit(1);
    return row ?? null;
  }

  async findByUserId(userId: string): Promise<Customer | null> {
    const [row] = await this.db
      .select()
      .from(customers)
      .where(eq(customers.userId, userId))
      .limit(1);
    return row ?? null;
  }

  async upsert(values: CustomerValues): Promise<Customer> {
    const rows = await this.db
      .insert(customers)
      .values(values)
      .onConflictDoUpdate({
        target: customers.stripeId,
        set: { ...values, updatedAt: new Date() },
      })
      .returning();
    return single(rows, 'Customer', values.stripeId);
  }

  async update(id: string, patch: Partial<CustomerValues>): Promise<Customer> {
    const rows = await this.db
      .update(customers)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(customers.id, id))
      .returning();
    return single(rows, 'Customer', id);
  }
}
