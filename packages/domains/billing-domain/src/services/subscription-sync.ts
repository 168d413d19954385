import { type Logger, isInvalidRequestMatching } from '@billmirror/domain-kernel';
import type { Customer } from '../entities/customer.js';
import type { Subscription } from '../entities/subscription.js';
import type { BillingGateway } from '../processor/billing-gateway.js';
import type { ProcessorSubscription } from '../processor/payloads.js';
import type { CatalogRepository } from '../repositories/catalog-repository.js';
import type { SubscriptionRepository } from '../repositories/subscription-repository.js';
import { fromUnix } from '../value-objects/money.js';

export class SubscriptionSync {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly subscriptions: SubscriptionRepository,
    private readonly catalog: CatalogRepository,
    private readonly logger: Logger,
  ) {}

  /**
   * Fetch one of the customer's subscriptions. Returns null for an empty id,
   * a subscription the processor no longer knows, or one that belongs to a
   * different customer.
   */
  async retrieve(
    customer: Customer,
    subscriptionId: string | null | undefined,
  ): Promise<ProcessorSubscription | null> {
    if (!subscriptionId) return null;

    let payload: ProcessorSubscription;
    try {
      payload = await this.gateway.retrieveSubscription(subscriptionId);
    } catch (error) {
      if (isInvalidRequestMatching(error, 'No such subscription')) {
        return null;
      }
      throw error;
    }

    if (payload.customer !== customer.stripeId) {
      this.logger.warn(
        { subscriptionId, customerId: customer.stripeId, owner: payload.customer },
        'Subscription belongs to another customer',
      );
      return null;
    }
    return payload;
  }

  async syncSubscriptionFromStripeData(
    customer: Customer,
    payload: ProcessorSubscription,
  ): Promise<Subscription> {
    const firstItem = payload.items?.data[0];
    const planRef = payload.plan ?? firstItem?.plan ?? null;
    const plan = planRef ? await this.catalog.findPlanByStripeId(planRef.id) : null;

    const start =
      fromUnix(payload.start ?? payload.start_date) ??
      fromUnix(payload.current_period_start) ??
      new Date();

    return this.subscriptions.upsert({
      stripeId: payload.id,
      customerId: customer.id,
      planId: plan?.id ?? null,
      status: payload.status,
      quantity: payload.quantity ?? firstItem?.quantity ?? 1,
      amount: plan?.amount ?? planRef?.amount ?? null,
      start,
      currentPeriodStart: fromUnix(
        payload.current_period_start ?? firstItem?.current_period_start,
      ),
      currentPeriodEnd: fromUnix(payload.current_period_end ?? firstItem?.current_period_end),
      cancelAtPeriodEnd: payload.cancel_at_period_end,
      canceledAt: fromUnix(payload.canceled_at),
      endedAt: fromUnix(payload.ended_at),
      trialStart: fromUnix(payload.trial_start),
      trialEnd: fromUnix(payload.trial_end),
    });
  }

  /**
   * Mirror every subscription the processor lists for the customer. Local
   * subscriptions the processor no longer lists have ended.
   */
  async syncCustomerSubscriptions(customer: Customer): Promise<Subscription[]> {
    const synced: Subscription[] = [];
    for await (const payload of this.gateway.listCustomerSubscriptions(customer.stripeId)) {
      synced.push(await this.syncSubscriptionFromStripeData(customer, payload));
    }

    const seen = new Set(synced.map((s) => s.stripeId));
    const now = new Date();
    for (const local of await this.subscriptions.listByCustomer(customer.id)) {
      if (seen.has(local.stripeId) || local.endedAt) continue;
      await this.subscriptions.update(local.id, {
        status: 'canceled',
        canceledAt: local.canceledAt ?? now,
        endedAt: now,
      });
      this.logger.info(
        { subscriptionId: local.stripeId, customerId: customer.stripeId },
        'Subscription no longer listed by processor; marked ended',
      );
    }

    return synced;
  }
}
