import type { Metadata, PackageDimensions, SkuInventory } from '../../drizzle/schema.js';
import type {
  ProcessorCharge,
  ProcessorCustomer,
  ProcessorEvent,
  ProcessorInvoice,
  ProcessorPlan,
  ProcessorProduct,
  ProcessorSku,
  ProcessorSubscription,
} from './payloads.js';

export interface CreateSkuParams {
  product: string;
  price: number; // minor units
  currency: string;
  inventory: SkuInventory;
  attributes?: Metadata;
  image?: string;
  metadata?: Metadata;
  packageDimensions?: PackageDimensions;
  active?: boolean;
}

export interface CreateCustomerParams {
  email: string;
  token?: string;
  metadata?: Metadata;
}

export interface SubscriptionParams {
  plan: string;
  quantity: number;
  coupon?: string;
  trialEnd?: Date;
  prorate?: boolean;
}

export interface CreateInvoiceParams {
  description?: string;
  metadata?: Metadata;
  subscription?: string;
}

/**
 * Everything the mirror asks of the payment processor.
 *
 * Implementations translate processor failures into `ProcessorError` /
 * `CardError` from the domain kernel; a missing object surfaces as an
 * invalid-request `ProcessorError` whose message starts with "No such".
 */
export interface BillingGateway {
  listPlans(): AsyncIterable<ProcessorPlan>;
  listProducts(): AsyncIterable<ProcessorProduct>;
  listSkus(): AsyncIterable<ProcessorSku>;
  listProductSkus(productStripeId: string): AsyncIterable<ProcessorSku>;
  retrieveSku(skuId: string): Promise<ProcessorSku>;
  createSku(params: CreateSkuParams): Promise<ProcessorSku>;

  retrieveCustomer(customerId: string): Promise<ProcessorCustomer>;
  createCustomer(params: CreateCustomerParams): Promise<ProcessorCustomer>;
  updateCustomerCard(customerId: string, token: string): Promise<ProcessorCustomer>;
  deleteCustomer(customerId: string): Promise<void>;

  retrieveSubscription(subscriptionId: string): Promise<ProcessorSubscription>;
  listCustomerSubscriptions(customerId: string): AsyncIterable<ProcessorSubscription>;
  /** Updates the customer's single live subscription, or creates one. */
  createOrUpdateSubscription(
    customerId: string,
    params: SubscriptionParams,
  ): Promise<ProcessorSubscription>;
  cancelSubscription(subscriptionId: string, atPeriodEnd: boolean): Promise<ProcessorSubscription>;

  retrieveCharge(chargeId: string): Promise<ProcessorCharge>;

  createInvoice(customerId: string, params?: CreateInvoiceParams): Promise<ProcessorInvoice>;
  retrieveInvoice(invoiceId: string): Promise<ProcessorInvoice>;
  payInvoice(invoiceId: string): Promise<ProcessorInvoice>;
  deleteInvoice(invoiceId: string): Promise<void>;
  listCustomerInvoices(customerId: string): AsyncIterable<ProcessorInvoice>;

  retrieveEvent(eventId: string): Promise<ProcessorEvent>;
}
