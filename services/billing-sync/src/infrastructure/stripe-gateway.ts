import {
  type BillingGateway,
  type CreateCustomerParams,
  type CreateInvoiceParams,
  type CreateSkuParams,
  type ProcessorCharge,
  ProcessorChargeSchema,
  type ProcessorCustomer,
  ProcessorCustomerSchema,
  type ProcessorEvent,
  ProcessorEventSchema,
  type ProcessorInvoice,
  ProcessorInvoiceSchema,
  type ProcessorPlan,
  ProcessorPlanSchema,
  type ProcessorProduct,
  ProcessorProductSchema,
  type ProcessorSku,
  ProcessorSkuSchema,
  type ProcessorSubscription,
  ProcessorSubscriptionSchema,
  type SubscriptionParams,
} from '@billmirror/billing-domain';
import {
  CardError,
  ProcessorError,
  type ProcessorErrorKind,
} from '@billmirror/domain-kernel';
import Stripe from 'stripe';
import { z, type ZodType, type ZodTypeDef } from 'zod';

const PAGE_SIZE = 100;

/** Subscriptions the processor will still bill; `updateSubscription` targets these. */
const LIVE_STATUSES = new Set(['trialing', 'active', 'past_due', 'unpaid']);

const RawListSchema = z.object({
  data: z.array(z.unknown()),
  has_more: z.boolean(),
});

const ERROR_KINDS: Record<string, ProcessorErrorKind> = {
  StripeInvalidRequestError: 'invalid_request',
  StripeIdempotencyError: 'invalid_request',
  StripeAuthenticationError: 'authentication',
  StripePermissionError: 'authentication',
  StripeRateLimitError: 'rate_limit',
  StripeConnectionError: 'connection',
};

export function createStripeClient(
  apiKey: string,
  options: Pick<Stripe.StripeConfig, 'httpClient'> = {},
): Stripe {
  return new Stripe(apiKey, { typescript: true, maxNetworkRetries: 2, ...options });
}

/** Stripe SDK errors become domain processor errors; anything else is returned as is. */
export function toProcessorError(error: unknown): unknown {
  if (!(error instanceof Stripe.errors.StripeError)) return error;
  if (error.type === 'StripeCardError') {
    return new CardError(error.message, error.code);
  }
  return new ProcessorError(
    ERROR_KINDS[error.type] ?? 'api',
    error.message,
    error.code,
    error.statusCode,
  );
}

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * `BillingGateway` over the Stripe SDK. Responses are parsed with the
 * domain's payload schemas; SKUs are no longer typed by the SDK and go
 * through `rawRequest`.
 */
export class StripeBillingGateway implements BillingGateway {
  constructor(private readonly stripe: Stripe) {}

  // -------------------------------------------------------------------------
  // Catalog
  // -------------------------------------------------------------------------

  listPlans(): AsyncIterable<ProcessorPlan> {
    return this.iterate(this.stripe.plans.list({ limit: PAGE_SIZE }), ProcessorPlanSchema);
  }

  listProducts(): AsyncIterable<ProcessorProduct> {
    return this.iterate(this.stripe.products.list({ limit: PAGE_SIZE }), ProcessorProductSchema);
  }

  listSkus(): AsyncIterable<ProcessorSku> {
    return this.rawList('/v1/skus', {});
  }

  listProductSkus(productStripeId: string): AsyncIterable<ProcessorSku> {
    return this.rawList('/v1/skus', { product: productStripeId });
  }

  async retrieveSku(skuId: string): Promise<ProcessorSku> {
    const sku = await this.call(() => this.stripe.rawRequest('GET', `/v1/skus/${skuId}`));
    return ProcessorSkuSchema.parse(sku);
  }

  async createSku(params: CreateSkuParams): Promise<ProcessorSku> {
    const body: Record<string, unknown> = {
      product: params.product,
      price: params.price,
      currency: params.currency,
      inventory: params.inventory,
    };
    if (params.attributes) body['attributes'] = params.attributes;
    if (params.image) body['image'] = params.image;
    if (params.metadata) body['metadata'] = params.metadata;
    if (params.packageDimensions) body['package_dimensions'] = params.packageDimensions;
    if (params.active !== undefined) body['active'] = params.active;

    const sku = await this.call(() => this.stripe.rawRequest('POST', '/v1/skus', body));
    return ProcessorSkuSchema.parse(sku);
  }

  // -------------------------------------------------------------------------
  // Customers
  // -------------------------------------------------------------------------

  async retrieveCustomer(customerId: string): Promise<ProcessorCustomer> {
    const customer = await this.call(() =>
      this.stripe.customers.retrieve(customerId, { expand: ['default_source'] }),
    );
    return ProcessorCustomerSchema.parse(customer);
  }

  async createCustomer(params: CreateCustomerParams): Promise<ProcessorCustomer> {
    const customer = await this.call(() =>
      this.stripe.customers.create({
        email: params.email,
        metadata: params.metadata,
        source: params.token,
        expand: ['default_source'],
      }),
    );
    return ProcessorCustomerSchema.parse(customer);
  }

  async updateCustomerCard(customerId: string, token: string): Promise<ProcessorCustomer> {
    const customer = await this.call(() =>
      this.stripe.customers.update(customerId, { source: token, expand: ['default_source'] }),
    );
    return ProcessorCustomerSchema.parse(customer);
  }

  async deleteCustomer(customerId: string): Promise<void> {
    await this.call(() => this.stripe.customers.del(customerId));
  }

  // -------------------------------------------------------------------------
  // Subscriptions
  // -------------------------------------------------------------------------

  async retrieveSubscription(subscriptionId: string): Promise<ProcessorSubscription> {
    const subscription = await this.call(() =>
      this.stripe.subscriptions.retrieve(subscriptionId),
    );
    return ProcessorSubscriptionSchema.parse(subscription);
  }

  listCustomerSubscriptions(customerId: string): AsyncIterable<ProcessorSubscription> {
    return this.iterate(
      this.stripe.subscriptions.list({ customer: customerId, limit: PAGE_SIZE }),
      ProcessorSubscriptionSchema,
    );
  }

  async createOrUpdateSubscription(
    customerId: string,
    params: SubscriptionParams,
  ): Promise<ProcessorSubscription> {
    const existing = await this.call(() =>
      this.stripe.subscriptions.list({ customer: customerId, limit: 10 }),
    );
    const live = existing.data.find((s) => LIVE_STATUSES.has(s.status));

    const discounts = params.coupon ? [{ coupon: params.coupon }] : undefined;
    const trialEnd = params.trialEnd ? Math.floor(params.trialEnd.getTime() / 1000) : undefined;

    const subscription = await this.call(() => {
      if (live) {
        return this.stripe.subscriptions.update(live.id, {
          items: [{ id: live.items.data[0]?.id, price: params.plan, quantity: params.quantity }],
          discounts,
          trial_end: trialEnd,
          proration_behavior: params.prorate === false ? 'none' : 'create_prorations',
        });
      }
      return this.stripe.subscriptions.create({
        customer: customerId,
        items: [{ price: params.plan, quantity: params.quantity }],
        discounts,
        trial_end: trialEnd,
      });
    });
    return ProcessorSubscriptionSchema.parse(subscription);
  }

  async cancelSubscription(
    subscriptionId: string,
    atPeriodEnd: boolean,
  ): Promise<ProcessorSubscription> {
    const subscription = await this.call(() =>
      atPeriodEnd
        ? this.stripe.subscriptions.update(subscriptionId, { cancel_at_period_end: true })
        : this.stripe.subscriptions.cancel(subscriptionId),
    );
    return ProcessorSubscriptionSchema.parse(subscription);
  }

  // -------------------------------------------------------------------------
  // Charges and invoices
  // -------------------------------------------------------------------------

  async retrieveCharge(chargeId: string): Promise<ProcessorCharge> {
    const charge = await this.call(() => this.stripe.charges.retrieve(chargeId));
    return ProcessorChargeSchema.parse(charge);
  }

  async createInvoice(
    customerId: string,
    params: CreateInvoiceParams = {},
  ): Promise<ProcessorInvoice> {
    const invoice = await this.call(() =>
      this.stripe.invoices.create({
        customer: customerId,
        description: params.description,
        metadata: params.metadata,
        subscription: params.subscription,
        pending_invoice_items_behavior: 'include',
      }),
    );
    return ProcessorInvoiceSchema.parse(invoice);
  }

  async retrieveInvoice(invoiceId: string): Promise<ProcessorInvoice> {
    const invoice = await this.call(() => this.stripe.invoices.retrieve(invoiceId));
    return ProcessorInvoiceSchema.parse(invoice);
  }

  async payInvoice(invoiceId: string): Promise<ProcessorInvoice> {
    const invoice = await this.call(() => this.stripe.invoices.pay(invoiceId));
    return ProcessorInvoiceSchema.parse(invoice);
  }

  async deleteInvoice(invoiceId: string): Promise<void> {
    await this.call(() => this.stripe.invoices.del(invoiceId));
  }

  listCustomerInvoices(customerId: string): AsyncIterable<ProcessorInvoice> {
    return this.iterate(
      this.stripe.invoices.list({ customer: customerId, limit: PAGE_SIZE }),
      ProcessorInvoiceSchema,
    );
  }

  async retrieveEvent(eventId: string): Promise<ProcessorEvent> {
    const event = await this.call(() => this.stripe.events.retrieve(eventId));
    return ProcessorEventSchema.parse(event);
  }

  // -------------------------------------------------------------------------

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw toProcessorError(error);
    }
  }

  /** Walks an auto-paging SDK list, parsing each item. */
  private async *iterate<T>(pages: AsyncIterable<unknown>, schema: Schema<T>): AsyncGenerator<T> {
    try {
      for await (const item of pages) {
        yield schema.parse(item);
      }
    } catch (error) {
      throw toProcessorError(error);
    }
  }

  /** `rawRequest` takes no params on GET, so the query goes into the path. */
  private async *rawList(
    path: string,
    params: Record<string, string>,
  ): AsyncGenerator<ProcessorSku> {
    let startingAfter: string | undefined;
    for (;;) {
      const query = new URLSearchParams({ ...params, limit: String(PAGE_SIZE) });
      if (startingAfter) query.set('starting_after', startingAfter);
      const page = RawListSchema.parse(
        await this.call(() => this.stripe.rawRequest('GET', `${path}?${query.toString()}`)),
      );
      let last: ProcessorSku | undefined;
      for (const item of page.data) {
        last = ProcessorSkuSchema.parse(item);
        yield last;
      }
      if (!page.has_more || !last) return;
      startingAfter = last.id;
    }
  }
}
