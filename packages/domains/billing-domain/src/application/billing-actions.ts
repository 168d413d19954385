import { DomainError, type Logger, Result } from '@billmirror/domain-kernel';
import type { BillingUser, Customer } from '../entities/customer.js';
import type { Subscription } from '../entities/subscription.js';
import type { CustomerService } from '../services/customer-service.js';
import type { PlanCatalog } from '../value-objects/plan-catalog.js';

export const NO_PAYMENT_METHOD = "You don't have an active payment method.";
export const NO_CUSTOMER = "You don't have a billing account yet.";

export interface SubscribeInput {
  planKey: string;
  token?: string;
}

export interface ChangePlanInput {
  planKey: string;
  coupon?: string | null;
}

/**
 * The four actions a signed-in user can take on their billing. Processor
 * and domain failures come back as a failed Result carrying their message.
 */
export class BillingActions {
  constructor(
    private readonly customers: CustomerService,
    private readonly plans: PlanCatalog,
    private readonly logger: Logger,
  ) {}

  async subscribe(user: BillingUser, input: SubscribeInput): Promise<Result<Subscription, string>> {
    if (!this.plans.has(input.planKey)) {
      return Result.fail(`Unknown plan "${input.planKey}"`);
    }

    return this.attempt('subscribe', user, async () => {
      const customer =
        (await this.customers.findForUser(user)) ?? (await this.customers.create(user));
      const withCard = input.token
        ? await this.customers.updateCard(customer, input.token)
        : customer;
      return this.customers.subscribe(withCard, input.planKey);
    });
  }

  async changePlan(
    user: BillingUser,
    input: ChangePlanInput,
  ): Promise<Result<Subscription, string>> {
    if (!this.plans.has(input.planKey)) {
      return Result.fail(`Unknown plan "${input.planKey}"`);
    }
    const customer = await this.customers.findForUser(user);
    if (!customer || !this.customers.canCharge(customer)) {
      return Result.fail(NO_PAYMENT_METHOD);
    }

    const coupon = input.coupon?.trim() ? input.coupon.trim() : null;
    return this.attempt('changePlan', user, () =>
      this.customers.subscribe(customer, input.planKey, { coupon }),
    );
  }

  /**
   * Replace the card on file. The first card also triggers an invoice for
   * anything pending, and every open invoice gets another payment attempt.
   */
  async changeCard(user: BillingUser, token: string): Promise<Result<Customer, string>> {
    const customer = await this.customers.findForUser(user);
    if (!customer) {
      return Result.fail(NO_CUSTOMER);
    }

    return this.attempt('changeCard', user, async () => {
      const firstCard = customer.cardFingerprint === '';
      const updated = await this.customers.updateCard(customer, token);
      if (firstCard) {
        await this.customers.sendInvoice(updated);
      }
      await this.customers.retryUnpaidInvoices(updated);
      return updated;
    });
  }

  async cancel(user: BillingUser): Promise<Result<Subscription, string>> {
    const customer = await this.customers.findForUser(user);
    if (!customer) {
      return Result.fail(NO_CUSTOMER);
    }
    return this.attempt('cancel', user, () => this.customers.cancel(customer));
  }

  private async attempt<T>(
    action: string,
    user: BillingUser,
    run: () => Promise<T>,
  ): Promise<Result<T, string>> {
    try {
      return Result.ok(await run());
    } catch (error) {
      if (!(error instanceof DomainError)) throw error;
      this.logger.warn(
        { action, userId: user.id, code: error.code, err: error.message },
        'Billing action failed',
      );
      return Result.fail(error.message || 'Unknown error');
    }
  }
}
