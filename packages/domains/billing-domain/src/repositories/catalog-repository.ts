import type { Plan, PlanValues, Tier, TierValues } from '../entities/plan.js';
import type { Product, ProductValues, Sku, SkuValues } from '../entities/product.js';

export interface CatalogRepository {
  upsertPlan(values: PlanValues): Promise<Plan>;
  findPlanById(id: string): Promise<Plan | null>;
  findPlanByStripeId(stripeId: string): Promise<Plan | null>;
  /** Drops every tier of the plan and inserts `values` in order. */
  replaceTiers(planId: string, values: TierValues[]): Promise<Tier[]>;
  listTiers(planId: string): Promise<Tier[]>;

  upsertProduct(values: ProductValues): Promise<Product>;
  findProductByStripeId(stripeId: string): Promise<Product | null>;

  upsertSku(values: SkuValues): Promise<Sku>;
  findSkuByStripeId(stripeId: string): Promise<Sku | null>;
}
