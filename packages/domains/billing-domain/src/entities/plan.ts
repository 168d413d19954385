import { z } from 'zod';
import type { plans, tiers } from '../../drizzle/schema.js';

export type Plan = typeof plans.$inferSelect;
export type PlanValues = Omit<typeof plans.$inferInsert, 'id' | 'createdAt' | 'updatedAt'>;

export type Tier = typeof tiers.$inferSelect;
export type TierValues = Omit<typeof tiers.$inferInsert, 'id' | 'planId'>;

export const PlanIntervalSchema = z.enum(['day', 'week', 'month', 'year']);

export type PlanInterval = z.infer<typeof PlanIntervalSchema>;

// ---------------------------------------------------------------------------
// Plan catalog
// ---------------------------------------------------------------------------

/** One purchasable plan as offered to users, keyed by a local plan key. */
export const CatalogPlanSchema = z.object({
  stripePlanId: z.string().min(1),
  name: z.string(),
  price: z.number().min(0), // major units
  currency: z.string().length(3).default('usd'),
  interval: PlanIntervalSchema,
  quantity: z.number().int().min(1).optional(),
});

export type CatalogPlan = z.infer<typeof CatalogPlanSchema>;

export const PlanCatalogSchema = z
  .record(z.string().min(1), CatalogPlanSchema)
  .refine((catalog) => Object.keys(catalog).length > 0, {
    message: 'Plan catalog must define at least one plan',
  });

export type PlanCatalogData = z.infer<typeof PlanCatalogSchema>;
