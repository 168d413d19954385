import {
  ConflictError,
  InvariantViolation,
  type Logger,
  isInvalidRequestMatching,
} from '@billmirror/domain-kernel';
import { type BillingUser, type Customer, canCharge } from '../entities/customer.js';
import { type Subscription, isLiveSubscription } from '../entities/subscription.js';
import type {
  BillingGateway,
  CreateCustomerParams,
  SubscriptionParams,
} from '../processor/billing-gateway.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { SubscriptionRepository } from '../repositories/subscription-repository.js';
import type { PlanCatalog } from '../value-objects/plan-catalog.js';
import { type CustomerSync, extractCard } from './customer-sync.js';
import type { InvoiceService } from './invoice-service.js';
import type { SubscriptionSync } from './subscription-sync.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateCustomerOptions {
  token?: string;
  planKey?: string;
  chargeImmediately?: boolean;
}

export interface SubscribeOptions {
  quantity?: number;
  trialDays?: number;
  coupon?: string | null;
  token?: string;
  chargeImmediately?: boolean;
}

/** Processor-side customer actions, each followed by a sync of what changed. */
export class CustomerService {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly customers: CustomerRepository,
    private readonly subscriptions: SubscriptionRepository,
    private readonly customerSync: CustomerSync,
    private readonly subscriptionSync: SubscriptionSync,
    private readonly invoices: InvoiceService,
    private readonly plans: PlanCatalog,
    private readonly logger: Logger,
  ) {}

  async findForUser(user: BillingUser): Promise<Customer | null> {
    return this.customers.findByUserId(user.id);
  }

  async create(user: BillingUser, options: CreateCustomerOptions = {}): Promise<Customer> {
    if (await this.customers.findByUserId(user.id)) {
      throw new ConflictError(`User ${user.id} already has a customer`);
    }
    if (options.planKey) {
      // fail before anything is created at the processor
      this.plans.get(options.planKey);
    }

    const params: CreateCustomerParams = { email: user.email, metadata: { userId: user.id } };
    if (options.token) params.token = options.token;
    const payload = await this.gateway.createCustomer(params);

    const card = extractCard(payload);
    const customer = await this.customers.upsert({
      stripeId: payload.id,
      userId: user.id,
      email: payload.email ?? user.email,
      cardFingerprint: card.fingerprint,
      cardLast4: card.last4,
      cardKind: card.kind,
    });
    this.logger.info({ customerId: customer.stripeId, userId: user.id }, 'Customer created');

    if (options.planKey) {
      await this.subscribe(customer, options.planKey, {
        chargeImmediately: options.chargeImmediately ?? true,
      });
    }
    return customer;
  }

  /** Delete the customer at the processor, then purge the local copy. */
  async delete(customer: Customer): Promise<Customer> {
    try {
      await this.gateway.deleteCustomer(customer.stripeId);
    } catch (error) {
      if (!isInvalidRequestMatching(error, 'No such customer')) throw error;
      this.logger.debug({ customerId: customer.stripeId }, 'Processor customer already gone');
    }
    return this.customerSync.purgeCustomer(customer);
  }

  async updateCard(customer: Customer, token: string): Promise<Customer> {
    const payload = await this.gateway.updateCustomerCard(customer.stripeId, token);
    return this.customerSync.syncCustomer(customer, payload);
  }

  /** Invoice and charge whatever is pending for the customer. */
  async sendInvoice(customer: Customer): Promise<boolean> {
    return this.invoices.createAndPay(customer);
  }

  async retryUnpaidInvoices(customer: Customer): Promise<number> {
    return this.invoices.retryUnpaidInvoices(customer);
  }

  canCharge(customer: Customer): boolean {
    return canCharge(customer);
  }

  /**
   * Put the customer on a catalog plan. The processor switches an existing
   * live subscription over, or starts a new one.
   */
  async subscribe(
    customer: Customer,
    planKey: string,
    options: SubscribeOptions = {},
  ): Promise<Subscription> {
    const plan = this.plans.get(planKey);
    let current = customer;
    if (options.token) {
      current = await this.updateCard(current, options.token);
    }

    const params: SubscriptionParams = {
      plan: plan.stripePlanId,
      quantity: options.quantity ?? plan.quantity ?? 1,
    };
    if (options.coupon) params.coupon = options.coupon;
    if (options.trialDays) {
      params.trialEnd = new Date(Date.now() + options.trialDays * DAY_MS);
    }

    const payload = await this.gateway.createOrUpdateSubscription(current.stripeId, params);
    const subscription = await this.subscriptionSync.syncSubscriptionFromStripeData(
      current,
      payload,
    );
    this.logger.info(
      { customerId: current.stripeId, subscriptionId: subscription.stripeId, planKey },
      'Customer subscribed',
    );

    if (options.chargeImmediately ?? true) {
      await this.sendInvoice(current);
    }
    return subscription;
  }

  /** Cancel the live subscription, by default once the paid period runs out. */
  async cancel(customer: Customer, atPeriodEnd = true): Promise<Subscription> {
    const live = (await this.subscriptions.listByCustomer(customer.id)).find(isLiveSubscription);
    if (!live) {
      throw new InvariantViolation('No active subscription to cancel');
    }

    const payload = await this.gateway.cancelSubscription(live.stripeId, atPeriodEnd);
    const subscription = await this.subscriptionSync.syncSubscriptionFromStripeData(
      customer,
      payload,
    );
    this.logger.info(
      { customerId: customer.stripeId, subscriptionId: live.stripeId, atPeriodEnd },
      'Subscription canceled',
    );
    return subscription;
  }
}
