import type {
  BillingEvent,
  BillingEventValues,
  EventProcessingException,
  EventProcessingExceptionValues,
  EventRepository,
} from '@billmirror/billing-domain';
import { eventProcessingExceptions, events } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { and, asc, eq, isNull, or } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleEventRepository implements EventRepository {
  constructor(private readonly db: Database) {}

  async existsByStripeId(stripeId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: events.id })
      .from(events)
      .where(eq(events.stripeId, stripeId))
      .limit(1);
    return rows.length > 0;
  }

  async findById(id: string): Promise<BillingEvent | null> {
    const [row] = await this.db.select().from(events).where(eq(events.id, id)).limit(1);
    return row ?? null;
  }

  async findByStripeId(stripeId: string): Promise<BillingEvent | null> {
    const [row] = await this.db.select().from(events).where(eq(events.stripeId, stripeId)).limit(1);
    return row ?? null;
  }

  async create(values: BillingEventValues): Promise<BillingEvent> {
    const rows = await this.db.insert(events).values(values).returning();
    return single(rows, 'Event', values.stripeId);
  }

  async update(id: string, patch: Partial<BillingEventValues>): Promise<BillingEvent> {
    const rows = await this.db.update(events).set(patch).where(eq(events.id, id)).returning();
    return single(rows, 'Event', id);
  }

  async listUnprocessed(limit: number): Promise<BillingEvent[]> {
    return this.db
      .select()
      .from(events)
      .where(
        and(
          eq(events.processed, false),
          or(eq(events.valid, true), isNull(events.valid), eq(events.retryValidation, true)),
        ),
      )
      .orderBy(asc(events.createdAt))
      .limit(limit);
  }

  async recordException(
    values: EventProcessingExceptionValues,
  ): Promise<EventProcessingException> {
    const rows = await this.db.insert(eventProcessingExceptions).values(values).returning();
    return single(rows, 'EventProcessingException', values.eventId ?? 'none');
  }
}
