import type { Logger } from '@billmirror/domain-kernel';
import type { Customer } from '../entities/customer.js';
import type { Charge } from '../entities/invoice.js';
import type { ChargeRepository } from '../repositories/charge-repository.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';

export interface Receipt {
  charge: Charge;
  customer: Customer;
  to: string;
}

/** Delivers a receipt for a paid charge (email, log, ...). */
export interface ReceiptSender {
  sendReceipt(receipt: Receipt): Promise<void>;
}

/**
 * Sends at most one receipt per charge. The charge row carries the
 * `receiptSent` flag, so a webhook replay does not email twice.
 */
export class ReceiptHook {
  constructor(
    private readonly sender: ReceiptSender,
    private readonly charges: ChargeRepository,
    private readonly customers: CustomerRepository,
    private readonly logger: Logger,
  ) {}

  async sendReceipt(charge: Charge): Promise<Charge> {
    if (charge.receiptSent) return charge;

    const customer = charge.customerId
      ? await this.customers.findById(charge.customerId)
      : null;
    if (!customer?.email || customer.purgedAt) {
      this.logger.debug(
        { chargeId: charge.stripeId },
        'Skipping receipt: no reachable customer',
      );
      return charge;
    }

    await this.sender.sendReceipt({ charge, customer, to: customer.email });
    this.logger.info(
      { chargeId: charge.stripeId, customerId: customer.stripeId },
      'Receipt sent',
    );
    return this.charges.update(charge.id, { receiptSent: true });
  }
}
