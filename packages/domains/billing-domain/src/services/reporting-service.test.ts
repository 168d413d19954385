import { beforeEach, describe, expect, it } from 'vitest';
import type { SubscriptionStatus } from '../entities/subscription.js';
import { InMemoryBillingStore } from '../testing/index.js';
import { ReportingService } from './reporting-service.js';

const utc = (iso: string) => new Date(`${iso}T00:00:00Z`);

describe('ReportingService', () => {
  let store: InMemoryBillingStore;
  let reports: ReportingService;
  let planIds: Record<string, string>;

  const subscribe = async (
    stripeId: string,
    plan: string,
    status: SubscriptionStatus,
    start: string,
    canceledAt: string | null = null,
  ) => {
    const customer = await store.customers.upsert({ stripeId });
    await store.subscriptions.upsert({
      stripeId: `sub_${stripeId}`,
      customerId: customer.id,
      planId: planIds[plan] ?? null,
      status,
      start: utc(start),
      canceledAt: canceledAt ? utc(canceledAt) : null,
    });
  };

  beforeEach(async () => {
    store = new InMemoryBillingStore();
    reports = new ReportingService(store.reporting);
    planIds = {};
    for (const stripeId of ['plan_test', 'plan_test2']) {
      const plan = await store.catalog.upsertPlan({
        stripeId,
        name: stripeId,
        amount: 1000,
        currency: 'usd',
        interval: 'month',
      });
      planIds[stripeId] = plan.id;
    }
  });

  describe('customer cohorts', () => {
    beforeEach(async () => {
      for (let i = 0; i < 10; i += 1) {
        await subscribe(`cus_${i}`, 'plan_test', 'active', '2013-01-01');
      }
      await subscribe('cus_gone', 'plan_test', 'canceled', '2013-01-15', '2013-04-30');
      await subscribe('cus_other', 'plan_test2', 'active', '2013-01-20');
      await subscribe('cus_trial', 'plan_test', 'trialing', '2013-01-25');
      await subscribe('cus_dec', 'plan_test', 'active', '2013-12-01');
    });

    it('counts customers who started in a month, ignoring trials', async () => {
      expect(await reports.customersStartedDuring(2013, 1)).toBe(12);
      expect(await reports.customersStartedDuring(2013, 4)).toBe(0);
      expect(await reports.customersStartedDuring(2013, 12)).toBe(1);
    });

    it('counts cancellations by the month they happened in', async () => {
      expect(await reports.customersCanceledDuring(2013, 4)).toBe(1);
      expect(await reports.customersCanceledDuring(2013, 3)).toBe(0);
      expect(await reports.canceledCustomers()).toBe(1);
    });

    it('counts trialing customers as active', async () => {
      expect(await reports.activeCustomers()).toBe(13);
      expect(await reports.churn()).toBeCloseTo(1 / 13);
    });

    it('groups cohorts by plan', async () => {
      expect(await reports.startedPlanSummaryFor(2013, 1)).toEqual([
        { plan: 'plan_test', count: 11 },
        { plan: 'plan_test2', count: 1 },
      ]);
      expect(await reports.activePlanSummary()).toEqual([
        { plan: 'plan_test', count: 12 },
        { plan: 'plan_test2', count: 1 },
      ]);
      expect(await reports.canceledPlanSummaryFor(2013, 4)).toEqual([
        { plan: 'plan_test', count: 1 },
      ]);
    });

    it('rejects a month outside 1-12', async () => {
      await expect(reports.customersStartedDuring(2013, 13)).rejects.toThrow(
        'Invalid month 2013-13',
      );
    });
  });

  it('counts a customer with several subscriptions once', async () => {
    const customer = await store.customers.upsert({ stripeId: 'cus_many' });
    for (const stripeId of ['sub_a', 'sub_b']) {
      await store.subscriptions.upsert({
        stripeId,
        customerId: customer.id,
        planId: planIds['plan_test'] ?? null,
        status: 'active',
        start: utc('2013-02-01'),
      });
    }

    expect(await reports.activeCustomers()).toBe(1);
    expect(await reports.activePlanSummary()).toEqual([{ plan: 'plan_test', count: 1 }]);
  });

  it('reports zero churn while nobody is active', async () => {
    await subscribe('cus_gone', 'plan_test', 'canceled', '2013-01-15', '2013-02-01');
    expect(await reports.churn()).toBe(0);
  });

  it('does not count a customer who subscribed again as churned', async () => {
    const customer = await store.customers.upsert({ stripeId: 'cus_back' });
    await store.subscriptions.upsert({
      stripeId: 'sub_old',
      customerId: customer.id,
      planId: planIds['plan_test'] ?? null,
      status: 'canceled',
      start: utc('2013-01-01'),
      canceledAt: utc('2013-03-10'),
    });
    await store.subscriptions.upsert({
      stripeId: 'sub_new',
      customerId: customer.id,
      planId: planIds['plan_test2'] ?? null,
      status: 'active',
      start: utc('2013-03-11'),
    });

    expect(await reports.canceledCustomers()).toBe(0);
    expect(await reports.customersCanceledDuring(2013, 3)).toBe(0);
    expect(await reports.canceledPlanSummaryFor(2013, 3)).toEqual([]);
    expect(await reports.activeCustomers()).toBe(1);
    expect(await reports.churn()).toBe(0);
  });

  it('lists subscriptions without a mirrored plan last', async () => {
    await subscribe('cus_legacy', 'plan_gone', 'active', '2013-01-05');
    await subscribe('cus_b', 'plan_test2', 'active', '2013-01-06');
    await subscribe('cus_a', 'plan_test', 'active', '2013-01-07');

    expect(await reports.activePlanSummary()).toEqual([
      { plan: 'plan_test', count: 1 },
      { plan: 'plan_test2', count: 1 },
      { plan: null, count: 1 },
    ]);
  });

  describe('transfers', () => {
    beforeEach(async () => {
      await store.transfers.upsert({
        stripeId: 'tr_b',
        amount: 455,
        currency: 'usd',
        status: 'paid',
        date: utc('2013-01-20'),
        chargeGross: 500,
        chargeFees: 45,
        net: 455,
      });
      await store.transfers.upsert({
        stripeId: 'tr_a',
        amount: 1910,
        currency: 'usd',
        status: 'paid',
        date: utc('2013-01-10'),
        chargeGross: 2000,
        chargeFees: 90,
        net: 1910,
      });
      await store.transfers.upsert({
        stripeId: 'tr_c',
        amount: 100,
        currency: 'usd',
        status: 'pending',
        date: utc('2013-01-25'),
      });
      await store.transfers.upsert({
        stripeId: 'tr_d',
        amount: 999,
        currency: 'usd',
        status: 'paid',
        date: utc('2013-02-01'),
      });
    });

    it('lists the month in date order', async () => {
      const transfers = await reports.transfersDuring(2013, 1);
      expect(transfers.map((t) => t.stripeId)).toEqual(['tr_a', 'tr_b', 'tr_c']);
    });

    it('totals paid transfers and formats them in major units', async () => {
      const report = await reports.paidTransferTotalsFor(2013, 1);

      expect(report.count).toBe(2);
      expect(report.totals).toEqual({
        amount: 2365,
        chargeGross: 2500,
        net: 2365,
        chargeFees: 135,
        adjustmentFees: 0,
        refundGross: 0,
        refundFees: 0,
        validationFees: 0,
      });
      expect(report.formatted.amount).toBe('23.65');
      expect(report.formatted.chargeFees).toBe('1.35');
      expect(report.formatted.refundGross).toBe('0.00');
    });

    it('returns empty totals for a month without payouts', async () => {
      const report = await reports.paidTransferTotalsFor(2013, 3);
      expect(report.count).toBe(0);
      expect(report.formatted.net).toBe('0.00');
    });
  });
});
