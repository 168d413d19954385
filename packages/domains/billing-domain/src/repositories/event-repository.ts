import type {
  BillingEvent,
  BillingEventValues,
  EventProcessingException,
  EventProcessingExceptionValues,
} from '../entities/event.js';

export interface EventRepository {
  existsByStripeId(stripeId: string): Promise<boolean>;
  findById(id: string): Promise<BillingEvent | null>;
  findByStripeId(stripeId: string): Promise<BillingEvent | null>;
  create(values: BillingEventValues): Promise<BillingEvent>;
  update(id: string, patch: Partial<BillingEventValues>): Promise<BillingEvent>;
  /**
   * Unprocessed events that are valid, not yet validated, or flagged for
   * another validation attempt, oldest first.
   */
  listUnprocessed(limit: number): Promise<BillingEvent[]>;

  recordException(values: EventProcessingExceptionValues): Promise<EventProcessingException>;
}
