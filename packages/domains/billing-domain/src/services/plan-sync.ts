import type { Logger } from '@billmirror/domain-kernel';
import type { Plan, TierValues } from '../entities/plan.js';
import type { BillingGateway } from '../processor/billing-gateway.js';
import type { ProcessorPlan } from '../processor/payloads.js';
import type { CatalogRepository } from '../repositories/catalog-repository.js';
import { convertAmountForDb } from '../value-objects/money.js';

export class PlanSync {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly catalog: CatalogRepository,
    private readonly logger: Logger,
  ) {}

  /** Mirror every plan the processor lists. Returns the number synced. */
  async syncPlans(): Promise<number> {
    let count = 0;
    for await (const plan of this.gateway.listPlans()) {
      await this.syncPlan(plan);
      count += 1;
    }
    this.logger.info({ count }, 'Plans synced');
    return count;
  }

  async syncPlan(payload: ProcessorPlan): Promise<Plan> {
    const currency = payload.currency ?? '';
    const plan = await this.catalog.upsertPlan({
      stripeId: payload.id,
      name: payload.name ?? payload.nickname ?? payload.id,
      amount: convertAmountForDb(payload.amount, currency),
      currency,
      interval: payload.interval,
      intervalCount: payload.interval_count,
      statementDescriptor: payload.statement_descriptor ?? '',
      trialPeriodDays: payload.trial_period_days ?? null,
      metadata: payload.metadata,
      billingScheme: payload.billing_scheme ?? null,
      tiersMode: payload.tiers_mode ?? null,
    });

    // Tiers carry no ids at the processor, so they are rebuilt wholesale.
    if (payload.tiers && payload.tiers.length > 0) {
      const tiers: TierValues[] = payload.tiers.map((tier) => ({
        amount: convertAmountForDb(tier.amount ?? tier.unit_amount, currency),
        flatAmount: convertAmountForDb(tier.flat_amount, currency),
        upTo: tier.up_to,
      }));
      await this.catalog.replaceTiers(plan.id, tiers);
    }

    return plan;
  }
}
