import { ValidationError } from '@billmirror/domain-kernel';
import { type CatalogPlan, type PlanCatalogData, PlanCatalogSchema } from '../entities/plan.js';

export interface PlanChoice {
  key: string;
  name: string;
}

/** The plans users may pick, keyed by plan key. */
export class PlanCatalog {
  private constructor(private readonly plans: ReadonlyMap<string, CatalogPlan>) {}

  static fromData(data: unknown): PlanCatalog {
    const parsed = PlanCatalogSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError('Invalid plan catalog', { issues: parsed.error.issues });
    }
    return PlanCatalog.of(parsed.data);
  }

  static of(data: PlanCatalogData): PlanCatalog {
    return new PlanCatalog(new Map(Object.entries(data)));
  }

  has(planKey: string): boolean {
    return this.plans.has(planKey);
  }

  get(planKey: string): CatalogPlan {
    const plan = this.plans.get(planKey);
    if (!plan) {
      throw new ValidationError(`Unknown plan "${planKey}"`, { planKey });
    }
    return plan;
  }

  /** Plan key for a processor plan id, if the catalog offers it. */
  keyFor(stripePlanId: string): string | null {
    for (const [key, plan] of this.plans) {
      if (plan.stripePlanId === stripePlanId) return key;
    }
    return null;
  }

  choices(): PlanChoice[] {
    return [...this.plans].map(([key, plan]) => ({ key, name: plan.name }));
  }
}
