import type { Logger } from '@billmirror/domain-kernel';
import type { Charge } from '../entities/invoice.js';
import type { BillingGateway } from '../processor/billing-gateway.js';
import type { ProcessorCharge } from '../processor/payloads.js';
import type { ChargeRepository } from '../repositories/charge-repository.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { InvoiceRepository } from '../repositories/invoice-repository.js';
import { convertAmountForDb, fromUnix } from '../value-objects/money.js';

export class ChargeSync {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly charges: ChargeRepository,
    private readonly customers: CustomerRepository,
    private readonly invoices: InvoiceRepository,
    private readonly logger: Logger,
  ) {}

  async syncCharge(chargeId: string): Promise<Charge> {
    const payload = await this.gateway.retrieveCharge(chargeId);
    return this.syncChargeFromStripeData(payload);
  }

  async syncChargeFromStripeData(payload: ProcessorCharge): Promise<Charge> {
    const customer = payload.customer
      ? await this.customers.findByStripeId(payload.customer)
      : null;
    const invoice = payload.invoice
      ? await this.invoices.findByStripeId(payload.invoice)
      : null;

    const charge = await this.charges.upsert({
      stripeId: payload.id,
      customerId: customer?.id ?? null,
      // keep an existing link when the invoice is not mirrored yet
      ...(invoice ? { invoiceId: invoice.id } : {}),
      source: payload.source?.id ?? payload.payment_method ?? '',
      currency: payload.currency,
      amount: convertAmountForDb(payload.amount, payload.currency),
      amountRefunded: convertAmountForDb(payload.amount_refunded, payload.currency),
      description: payload.description ?? '',
      paid: payload.paid,
      disputed: payload.disputed,
      refunded: payload.refunded,
      captured: payload.captured,
      chargeCreated: fromUnix(payload.created),
    });

    this.logger.debug({ chargeId: charge.stripeId }, 'Charge synced');
    return charge;
  }
}
