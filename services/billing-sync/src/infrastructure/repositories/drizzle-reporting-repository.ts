import {
  ACTIVE_STATUSES,
  type CustomerCohortFilter,
  type DateRange,
  type PlanCount,
  type ReportingRepository,
  type Transfer,
} from '@billmirror/billing-domain';
import { plans, subscriptions, transfers } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import {
  type SQL,
  and,
  asc,
  countDistinct,
  eq,
  gte,
  inArray,
  lt,
  notExists,
  notInArray,
} from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';

const live = alias(subscriptions, 'live');

function cohortWhere(db: Database, filter: CustomerCohortFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (filter.statuses) conditions.push(inArray(subscriptions.status, [...filter.statuses]));
  if (filter.excludeStatuses) {
    conditions.push(notInArray(subscriptions.status, [...filter.excludeStatuses]));
  }
  if (filter.startedWithin) {
    conditions.push(gte(subscriptions.start, filter.startedWithin.start));
    conditions.push(lt(subscriptions.start, filter.startedWithin.end));
  }
  if (filter.canceledWithin) {
    conditions.push(gte(subscriptions.canceledAt, filter.canceledWithin.start));
    conditions.push(lt(subscriptions.canceledAt, filter.canceledWithin.end));
  }
  if (filter.withoutLiveSubscription) {
    conditions.push(
      notExists(
        db
          .select({ id: live.id })
          .from(live)
          .where(
            and(
              eq(live.customerId, subscriptions.customerId),
              inArray(live.status, [...ACTIVE_STATUSES]),
            ),
          ),
      ),
    );
  }
  return and(...conditions);
}

export class DrizzleReportingRepository implements ReportingRepository {
  constructor(private readonly db: Database) {}

  async countCustomers(filter: CustomerCohortFilter): Promise<number> {
    const [row] = await this.db
      .select({ count: countDistinct(subscriptions.customerId) })
      .from(subscriptions)
      .where(cohortWhere(this.db, filter));
    return row?.count ?? 0;
  }

  async planSummary(filter: CustomerCohortFilter): Promise<PlanCount[]> {
    return this.db
      .select({ plan: plans.stripeId, count: countDistinct(subscriptions.customerId) })
      .from(subscriptions)
      .leftJoin(plans, eq(subscriptions.planId, plans.id))
      .where(cohortWhere(this.db, filter))
      .groupBy(plans.stripeId)
      .orderBy(asc(plans.stripeId));
  }

  async listTransfers(range: DateRange, status?: string): Promise<Transfer[]> {
    return this.db
      .select()
      .from(transfers)
      .where(
        and(
          gte(transfers.date, range.start),
          lt(transfers.date, range.end),
          status === undefined ? undefined : eq(transfers.status, status),
        ),
      )
      .orderBy(asc(transfers.date));
  }
}
