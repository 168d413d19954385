import { beforeEach, describe, expect, it } from 'vitest';
import { type TestBilling, createTestBilling, planPayload } from '../testing/index.js';

describe('PlanSync', () => {
  let t: TestBilling;

  beforeEach(() => {
    t = createTestBilling();
  });

  it('mirrors every listed plan', async () => {
    t.gateway.plans.set('plan_pro', planPayload());
    t.gateway.plans.set(
      'plan_team',
      planPayload({ id: 'plan_team', amount: 2900, name: 'Team', trial_period_days: 14 }),
    );

    const count = await t.billing.plans.syncPlans();

    expect(count).toBe(2);
    const team = await t.store.catalog.findPlanByStripeId('plan_team');
    expect(team).toMatchObject({
      name: 'Team',
      amount: 2900,
      currency: 'usd',
      interval: 'month',
      intervalCount: 1,
      trialPeriodDays: 14,
      statementDescriptor: '',
    });
  });

  it('updates a plan in place on a second sync', async () => {
    await t.billing.plans.syncPlan(planPayload());
    await t.billing.plans.syncPlan(planPayload({ amount: 1299, statement_descriptor: 'PRO PLAN' }));

    expect(t.store.planRows).toHaveLength(1);
    expect(t.store.planRows[0]).toMatchObject({ amount: 1299, statementDescriptor: 'PRO PLAN' });
  });

  it('falls back to the nickname, then the id, for the plan name', async () => {
    const nicknamed = await t.billing.plans.syncPlan(
      planPayload({ id: 'plan_a', name: null, nickname: 'Starter' }),
    );
    const bare = await t.billing.plans.syncPlan(planPayload({ id: 'plan_b', name: null }));

    expect(nicknamed.name).toBe('Starter');
    expect(bare.name).toBe('plan_b');
  });

  it('rebuilds the tiers of a tiered plan', async () => {
    const tiered = planPayload({
      id: 'plan_tiered',
      amount: null,
      billing_scheme: 'tiered',
      tiers_mode: 'graduated',
      tiers: [
        { up_to: 10, unit_amount: 500, flat_amount: null },
        { up_to: null, amount: 400, flat_amount: 100 },
      ],
    });
    const plan = await t.billing.plans.syncPlan(tiered);

    expect(plan).toMatchObject({ amount: null, billingScheme: 'tiered', tiersMode: 'graduated' });
    const tiers = await t.store.catalog.listTiers(plan.id);
    expect(tiers.map(({ amount, flatAmount, upTo }) => ({ amount, flatAmount, upTo }))).toEqual([
      { amount: 500, flatAmount: null, upTo: 10 },
      { amount: 400, flatAmount: 100, upTo: null },
    ]);

    await t.billing.plans.syncPlan(
      planPayload({ ...tiered, tiers: [{ up_to: null, unit_amount: 300 }] }),
    );
    expect(await t.store.catalog.listTiers(plan.id)).toHaveLength(1);
  });
});
