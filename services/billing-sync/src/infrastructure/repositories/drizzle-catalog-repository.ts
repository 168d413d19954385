import type {
  CatalogRepository,
  Plan,
  PlanValues,
  Product,
  ProductValues,
  Sku,
  SkuValues,
  Tier,
  TierValues,
} from '@billmirror/billing-domain';
import { plans, products, skus, tiers } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { asc, eq } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleCatalogRepository implements CatalogRepository {
  constructor(private readonly db: Database) {}

  async upsertPlan(values: PlanValues): Promise<Plan> {
    const rows = await this.db
      .insert(plans)
      .values(values)
      .onConflictDoUpdate({ target: plans.stripeId, set: { ...values, updatedAt: new Date() } })
      .returning();
    return single(rows, 'Plan', values.stripeId);
  }

  async findPlanById(id: string): Promise<Plan | null> {
    const [row] = await this.db.select().from(plans).where(eq(plans.id, id)).limit(1);
    return row ?? null;
  }

  async findPlanByStripeId(stripeId: string): Promise<Plan | null> {
    const [row] = await this.db.select().from(plans).where(eq(plans.stripeId, stripeId)).limit(1);
    return row ?? null;
  }

  // neon-http runs each statement on its own, so a reader may briefly see no tiers
  async replaceTiers(planId: string, values: TierValues[]): Promise<Tier[]> {
    await this.db.delete(tiers).where(eq(tiers.planId, planId));
    if (values.length === 0) return [];
    return this.db
      .insert(tiers)
      .values(values.map((tier) => ({ ...tier, planId })))
      .returning();
  }

  async listTiers(planId: string): Promise<Tier[]> {
    return this.db.select().from(tiers).where(eq(tiers.planId, planId)).orderBy(asc(tiers.upTo));
  }

  async upsertProduct(values: ProductValues): Promise<Product> {
    const rows = await this.db
      .insert(products)
      .values(values)
      .onConflictDoUpdate({ target: products.stripeId, set: values })
      .returning();
    return single(rows, 'Product', values.stripeId);
  }

  async findProductByStripeId(stripeId: string): Promise<Product | null> {
    const [row] = await this.db
      .select()
      .from(products)
      .where(eq(products.stripeId, stripeId))
      .limit(1);
    return row ?? null;
  }

  async upsertSku(values: SkuValues): Promise<Sku> {
    const rows = await this.db
      .insert(skus)
      .values(values)
      .onConflictDoUpdate({ target: skus.stripeId, set: values })
      .returning();
    return single(rows, 'Sku', values.stripeId);
  }

  async findSkuByStripeId(stripeId: string): Promise<Sku | null> {
    const [row] = await this.db.select().from(skus).where(eq(skus.stripeId, stripeId)).limit(1);
    return row ?? null;
  }
}
