import type { Transfer } from '../entities/transfer.js';
import type { SubscriptionStatus } from '../entities/subscription.js';
import type { DateRange } from '../value-objects/month-range.js';

/**
 * Cohort filter over customers' subscriptions. All given conditions must
 * hold for the same subscription row.
 */
export interface CustomerCohortFilter {
  statuses?: readonly SubscriptionStatus[];
  excludeStatuses?: readonly SubscriptionStatus[];
  startedWithin?: DateRange;
  canceledWithin?: DateRange;
  /** Leave out customers who hold any subscription in an active status. */
  withoutLiveSubscription?: boolean;
}

export interface PlanCount {
  /** Stripe id of the plan; null for subscriptions without a mirrored plan. */
  plan: string | null;
  count: number;
}

export interface ReportingRepository {
  /** Distinct customers with at least one subscription matching `filter`. */
  countCustomers(filter: CustomerCohortFilter): Promise<number>;
  /**
   * Distinct customers per plan, for subscriptions matching `filter`,
   * ordered by plan id with the unmatched plan last.
   */
  planSummary(filter: CustomerCohortFilter): Promise<PlanCount[]>;
  listTransfers(range: DateRange, status?: string): Promise<Transfer[]>;
}
