import type { Charge, ChargeRepository, ChargeValues } from '@billmirror/billing-domain';
import { charges } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { eq } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleChargeRepository implements ChargeRepository {
  constructor(private readonly db: Database) {}

  async upsert(values: ChargeValues): Promise<Charge> {
    const rows = await this.db
      .insert(charges)
      .values(values)
      .onConflictDoUpdate({ target: charges.stripeId, set: values })
      .returning();
    return single(rows, 'Charge', values.stripeId);
  }

  async findByStripeId(stripeId: string): Promise<Charge | null> {
    const [row] = await this.db
      .select()
      .from(charges)
      .where(eq(charges.stripeId, stripeId))
      .limit(1);
    return row ?? null;
  }

  async update(id: string, patch: Partial<ChargeValues>): Promise<Charge> {
    const rows = await this.db.update(charges).set(patch).where(eq(charges.id, id)).returning();
    return single(rows, 'Charge', id);
  }
}
