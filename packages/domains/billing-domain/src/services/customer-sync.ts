import type { Logger } from '@billmirror/domain-kernel';
import { type CardDetails, type Customer, NO_CARD } from '../entities/customer.js';
import type { BillingGateway } from '../processor/billing-gateway.js';
import { type ProcessorCustomer, ProcessorCardSchema } from '../processor/payloads.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { SubscriptionRepository } from '../repositories/subscription-repository.js';

/** Card details of the customer's default source, or empty strings when none. */
export function extractCard(payload: ProcessorCustomer): CardDetails {
  const { default_source: source } = payload;
  if (!source) return NO_CARD;

  let card = typeof source === 'string' ? null : source;
  if (typeof source === 'string') {
    for (const entry of payload.sources?.data ?? []) {
      const parsed = ProcessorCardSchema.safeParse(entry);
      if (parsed.success && parsed.data.id === source) {
        card = parsed.data;
        break;
      }
    }
  }
  if (!card) return NO_CARD;

  return {
    fingerprint: card.fingerprint ?? '',
    last4: card.last4 ?? '',
    kind: card.brand ?? '',
  };
}

export class CustomerSync {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly customers: CustomerRepository,
    private readonly subscriptions: SubscriptionRepository,
    private readonly logger: Logger,
  ) {}

  /**
   * Refresh the local customer from the processor. A customer the processor
   * reports as deleted is purged.
   */
  async syncCustomer(customer: Customer, payload?: ProcessorCustomer): Promise<Customer> {
    const data = payload ?? (await this.gateway.retrieveCustomer(customer.stripeId));
    if (data.deleted) {
      return this.purgeCustomer(customer);
    }

    const card = extractCard(data);
    return this.customers.update(customer.id, {
      email: data.email ?? customer.email,
      cardFingerprint: card.fingerprint,
      cardLast4: card.last4,
      cardKind: card.kind,
    });
  }

  /** Detach the user and card, and end every local subscription. */
  async purgeCustomer(customer: Customer): Promise<Customer> {
    const now = new Date();
    for (const subscription of await this.subscriptions.listByCustomer(customer.id)) {
      if (subscription.endedAt) continue;
      await this.subscriptions.update(subscription.id, {
        status: 'canceled',
        canceledAt: subscription.canceledAt ?? now,
        endedAt: now,
      });
    }

    const purged = await this.customers.update(customer.id, {
      userId: null,
      cardFingerprint: NO_CARD.fingerprint,
      cardLast4: NO_CARD.last4,
      cardKind: NO_CARD.kind,
      purgedAt: now,
    });
    this.logger.info({ customerId: customer.stripeId }, 'Customer purged');
    return purged;
  }
}
