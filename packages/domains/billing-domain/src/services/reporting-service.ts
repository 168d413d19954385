import { ACTIVE_STATUSES } from '../entities/subscription.js';
import type { Transfer } from '../entities/transfer.js';
import type { PlanCount, ReportingRepository } from '../repositories/reporting-repository.js';
import { formatAmount } from '../value-objects/money.js';
import { getRange } from '../value-objects/month-range.js';

export const TRANSFER_TOTAL_FIELDS = [
  'amount',
  'chargeGross',
  'net',
  'chargeFees',
  'adjustmentFees',
  'refundGross',
  'refundFees',
  'validationFees',
] as const;

export type TransferTotalField = (typeof TRANSFER_TOTAL_FIELDS)[number];

export interface PaidTransferTotals {
  count: number;
  /** Minor units. */
  totals: Record<TransferTotalField, number>;
  formatted: Record<TransferTotalField, string>;
}

/** Month cohorts, plan mix, churn and payout totals over the local mirror. */
export class ReportingService {
  constructor(private readonly reporting: ReportingRepository) {}

  async customersStartedDuring(year: number, month: number): Promise<number> {
    return this.reporting.countCustomers({
      startedWithin: getRange(year, month),
      excludeStatuses: ['trialing'],
    });
  }

  async customersCanceledDuring(year: number, month: number): Promise<number> {
    return this.reporting.countCustomers({
      statuses: ['canceled'],
      canceledWithin: getRange(year, month),
      withoutLiveSubscription: true,
    });
  }

  /** Customers with a canceled subscription and nothing live to replace it. */
  async canceledCustomers(): Promise<number> {
    return this.reporting.countCustomers({
      statuses: ['canceled'],
      withoutLiveSubscription: true,
    });
  }

  async activeCustomers(): Promise<number> {
    return this.reporting.countCustomers({ statuses: ACTIVE_STATUSES });
  }

  async startedPlanSummaryFor(year: number, month: number): Promise<PlanCount[]> {
    return this.reporting.planSummary({
      startedWithin: getRange(year, month),
      excludeStatuses: ['trialing'],
    });
  }

  async activePlanSummary(): Promise<PlanCount[]> {
    return this.reporting.planSummary({ statuses: ACTIVE_STATUSES });
  }

  async canceledPlanSummaryFor(year: number, month: number): Promise<PlanCount[]> {
    return this.reporting.planSummary({
      statuses: ['canceled'],
      canceledWithin: getRange(year, month),
      withoutLiveSubscription: true,
    });
  }

  /** Canceled over active customers; 0 while nobody is active. */
  async churn(): Promise<number> {
    const [canceled, active] = await Promise.all([
      this.canceledCustomers(),
      this.activeCustomers(),
    ]);
    return active === 0 ? 0 : canceled / active;
  }

  async transfersDuring(year: number, month: number): Promise<Transfer[]> {
    return this.reporting.listTransfers(getRange(year, month));
  }

  async paidTransferTotalsFor(
    year: number,
    month: number,
    currency = 'usd',
  ): Promise<PaidTransferTotals> {
    const paid = await this.reporting.listTransfers(getRange(year, month), 'paid');

    const totals = emptyTotals();
    for (const transfer of paid) {
      for (const field of TRANSFER_TOTAL_FIELDS) {
        totals[field] += transfer[field] ?? 0;
      }
    }

    return { count: paid.length, totals, formatted: formatTotals(totals, currency) };
  }
}

function emptyTotals(): Record<TransferTotalField, number> {
  return {
    amount: 0,
    chargeGross: 0,
    net: 0,
    chargeFees: 0,
    adjustmentFees: 0,
    refundGross: 0,
    refundFees: 0,
    validationFees: 0,
  };
}

function formatTotals(
  totals: Record<TransferTotalField, number>,
  currency: string,
): Record<TransferTotalField, string> {
  const format = (amount: number) => formatAmount(amount, currency);
  return {
    amount: format(totals.amount),
    chargeGross: format(totals.chargeGross),
    net: format(totals.net),
    chargeFees: format(totals.chargeFees),
    adjustmentFees: format(totals.adjustmentFees),
    refundGross: format(totals.refundGross),
    refundFees: format(totals.refundFees),
    validationFees: format(totals.validationFees),
  };
}
