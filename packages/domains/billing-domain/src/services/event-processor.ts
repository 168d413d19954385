import { isDeepStrictEqual } from 'node:util';
import {
  type Logger,
  ValidationError,
  errorMessage,
  isProcessorError,
} from '@billmirror/domain-kernel';
import { ZodError, z } from 'zod';
import type { Customer } from '../entities/customer.js';
import { type BillingEvent, eventFamily } from '../entities/event.js';
import type { BillingGateway } from '../processor/billing-gateway.js';
import {
  ProcessorCustomerSchema,
  type ProcessorEvent,
  ProcessorEventSchema,
  ProcessorInvoiceSchema,
  ProcessorPlanSchema,
  ProcessorProductSchema,
  ProcessorSkuSchema,
  ProcessorTransferSchema,
  eventRequestId,
} from '../processor/payloads.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { EventRepository } from '../repositories/event-repository.js';
import type { CatalogSync } from './catalog-sync.js';
import type { ChargeSync } from './charge-sync.js';
import type { CustomerSync } from './customer-sync.js';
import type { InvoiceService } from './invoice-service.js';
import type { PlanSync } from './plan-sync.js';
import type { SubscriptionSync } from './subscription-sync.js';
import type { TransferSync } from './transfer-sync.js';

const RawPayloadSchema = z.record(z.unknown());
const CUSTOMER_CRUD_KINDS = new Set(['customer.created', 'customer.updated', 'customer.deleted']);
const ObjectIdSchema = z.object({ id: z.string() }).passthrough();

const PERMANENT_FAILURES = new Set(['invalid_request', 'card']);

/** Whether a failed lookup is worth repeating later. */
function isTransientFailure(error: unknown): boolean {
  if (error instanceof ZodError) return false;
  return !(isProcessorError(error) && PERMANENT_FAILURES.has(error.kind));
}

export interface WebhookReceipt {
  duplicate: boolean;
  event: BillingEvent | null;
}

export interface EventHandlers {
  invoices: InvoiceService;
  charges: ChargeSync;
  transfers: TransferSync;
  subscriptions: SubscriptionSync;
  customers: CustomerSync;
  plans: PlanSync;
  catalog: CatalogSync;
}

/**
 * Webhook intake: record, validate against the processor, then route to the
 * sync routine for the event's object.
 */
export class EventProcessor {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly events: EventRepository,
    private readonly customers: CustomerRepository,
    private readonly handlers: EventHandlers,
    private readonly logger: Logger,
  ) {}

  async receiveWebhook(payload: unknown): Promise<WebhookReceipt> {
    const raw = RawPayloadSchema.safeParse(payload);
    if (!raw.success) {
      throw new ValidationError('Malformed webhook payload', { issues: raw.error.issues });
    }
    const parsed = ProcessorEventSchema.safeParse(raw.data);
    if (!parsed.success) {
      throw new ValidationError('Malformed webhook payload', { issues: parsed.error.issues });
    }
    const data = parsed.data;

    if (await this.events.existsByStripeId(data.id)) {
      await this.events.recordException({
        eventId: null,
        data: raw.data,
        message: 'Duplicate event record',
        traceback: '',
      });
      this.logger.warn({ eventId: data.id, kind: data.type }, 'Duplicate webhook event');
      return { duplicate: true, event: null };
    }

    const created = await this.events.create({
      stripeId: data.id,
      kind: data.type,
      livemode: data.livemode,
      webhookMessage: raw.data,
      request: eventRequestId(data),
      pendingWebhooks: data.pending_webhooks,
      apiVersion: data.api_version ?? '',
    });
    this.logger.info({ eventId: created.stripeId, kind: created.kind }, 'Webhook event recorded');

    const validated = await this.validateEvent(created);
    return { duplicate: false, event: await this.processEvent(validated) };
  }

  /**
   * Fetch the event back from the processor; it is valid only when the
   * processor's copy carries the same data as the webhook. A failed lookup
   * marks the event invalid, and flags it for another attempt unless the
   * processor rejected the request outright.
   */
  async validateEvent(event: BillingEvent): Promise<BillingEvent> {
    let retrieved: ProcessorEvent;
    try {
      retrieved = await this.gateway.retrieveEvent(event.stripeId);
    } catch (error) {
      await this.recordFailure(event, error);
      return this.events.update(event.id, {
        valid: false,
        retryValidation: isTransientFailure(error),
      });
    }

    const valid = isDeepStrictEqual(event.webhookMessage['data'], retrieved.data);
    if (!valid) {
      this.logger.warn({ eventId: event.stripeId }, 'Webhook data does not match processor copy');
    }
    return this.events.update(event.id, {
      validatedMessage: retrieved,
      valid,
      retryValidation: false,
    });
  }

  /** The customer an event is about, if it is mirrored locally. */
  async linkCustomer(event: BillingEvent): Promise<BillingEvent> {
    const object = this.eventObject(event);
    const reference = CUSTOMER_CRUD_KINDS.has(event.kind) ? object['id'] : object['customer'];
    if (typeof reference !== 'string' || reference === '') return event;

    const customer = await this.customers.findByStripeId(reference);
    if (!customer || customer.id === event.customerId) return event;
    return this.events.update(event.id, { customerId: customer.id });
  }

  /**
   * Apply a validated event to the mirror. Failures are stored as processing
   * exceptions and leave the event unprocessed for a later retry.
   */
  async processEvent(event: BillingEvent): Promise<BillingEvent> {
    if (!event.valid || event.processed) return event;

    try {
      const linked = await this.linkCustomer(event);
      await this.dispatch(linked);
      const processed = await this.events.update(linked.id, { processed: true });
      this.logger.info({ eventId: event.stripeId, kind: event.kind }, 'Webhook event processed');
      return processed;
    } catch (error) {
      await this.recordFailure(event, error);
      return event;
    }
  }

  async reprocessEvent(eventId: string): Promise<BillingEvent | null> {
    const event = await this.events.findById(eventId);
    if (!event) return null;
    return this.processEvent(await this.validateEvent(event));
  }

  /**
   * Retry events that failed processing, validating again those that were
   * never validated or whose validation may now succeed. Returns how many
   * went through.
   */
  async processPending(limit = 100): Promise<number> {
    let processed = 0;
    for (const event of await this.events.listUnprocessed(limit)) {
      const validated = event.valid === true ? event : await this.validateEvent(event);
      const result = await this.processEvent(validated);
      if (result.processed) processed += 1;
    }
    return processed;
  }

  private async dispatch(event: BillingEvent): Promise<void> {
    const object = this.eventObject(event);
    const { kind } = event;

    switch (eventFamily(kind)) {
      case 'invoice':
        if (kind !== 'invoice.deleted') {
          await this.handlers.invoices.syncInvoiceFromStripeData(ProcessorInvoiceSchema.parse(object));
        }
        break;
      case 'charge':
        await this.handlers.charges.syncCharge(ObjectIdSchema.parse(object).id);
        break;
      case 'transfer':
        await this.handlers.transfers.syncTransfer(ProcessorTransferSchema.parse(object), event);
        break;
      case 'subscription': {
        const customer = await this.linkedCustomer(event);
        if (customer) {
          await this.handlers.subscriptions.syncCustomerSubscriptions(customer);
        }
        break;
      }
      case 'customer': {
        const customer = await this.linkedCustomer(event);
        if (!customer) break;
        if (kind === 'customer.deleted') {
          await this.handlers.customers.purgeCustomer(customer);
        } else if (kind === 'customer.created' || kind === 'customer.updated') {
          await this.handlers.customers.syncCustomer(customer, ProcessorCustomerSchema.parse(object));
        } else {
          await this.handlers.customers.syncCustomer(customer);
        }
        break;
      }
      case 'plan':
        if (kind !== 'plan.deleted') {
          await this.handlers.plans.syncPlan(ProcessorPlanSchema.parse(object));
        }
        break;
      case 'product':
        if (kind !== 'product.deleted') {
          await this.handlers.catalog.syncProduct(ProcessorProductSchema.parse(object));
        }
        break;
      case 'sku':
        if (kind !== 'sku.deleted') {
          await this.handlers.catalog.syncSkuFromStripeData(ProcessorSkuSchema.parse(object));
        }
        break;
      case 'other':
        this.logger.debug({ eventId: event.stripeId, kind }, 'No handler for event kind');
        break;
    }
  }

  private eventObject(event: BillingEvent): Record<string, unknown> {
    return ProcessorEventSchema.parse(event.webhookMessage).data.object;
  }

  private async linkedCustomer(event: BillingEvent): Promise<Customer | null> {
    return event.customerId ? this.customers.findById(event.customerId) : null;
  }

  private async recordFailure(event: BillingEvent, error: unknown): Promise<void> {
    const message = errorMessage(error);
    await this.events.recordException({
      eventId: event.id,
      data: isProcessorError(error) ? (error.details ?? null) : null,
      message,
      traceback: error instanceof Error ? (error.stack ?? '') : '',
    });
    this.logger.error(
      { eventId: event.stripeId, kind: event.kind, err: message },
      'Webhook event processing failed',
    );
  }
}
