import type { Logger } from '@billmirror/domain-kernel';
import type { BillingEvent } from '../entities/event.js';
import type { Transfer, TransferChargeFeeValues } from '../entities/transfer.js';
import type { ProcessorTransfer } from '../processor/payloads.js';
import type { TransferRepository } from '../repositories/transfer-repository.js';
import { convertAmountForDb, fromUnix } from '../value-objects/money.js';

type TransferSummary = Partial<NonNullable<ProcessorTransfer['summary']>>;

export class TransferSync {
  constructor(
    private readonly transfers: TransferRepository,
    private readonly logger: Logger,
  ) {}

  /** Mirror a transfer (usually from a `transfer.*` event) and its charge fee breakdown. */
  async syncTransfer(payload: ProcessorTransfer, event?: BillingEvent | null): Promise<Transfer> {
    const { currency } = payload;
    const summary: TransferSummary = payload.summary ?? {};
    const date = fromUnix(payload.date ?? payload.created) ?? new Date();

    const transfer = await this.transfers.upsert({
      stripeId: payload.id,
      ...(event ? { eventId: event.id } : {}),
      amount: convertAmountForDb(payload.amount, currency),
      currency,
      status: payload.status,
      date,
      description: payload.description ?? '',
      adjustmentCount: summary.adjustment_count ?? null,
      adjustmentFees: convertAmountForDb(summary.adjustment_fees, currency),
      adjustmentGross: convertAmountForDb(summary.adjustment_gross, currency),
      chargeCount: summary.charge_count ?? null,
      chargeFees: convertAmountForDb(summary.charge_fees, currency),
      chargeGross: convertAmountForDb(summary.charge_gross, currency),
      collectedFeeCount: summary.collected_fee_count ?? null,
      collectedFeeGross: convertAmountForDb(summary.collected_fee_gross, currency),
      net: convertAmountForDb(summary.net, currency),
      refundCount: summary.refund_count ?? null,
      refundFees: convertAmountForDb(summary.refund_fees, currency),
      refundGross: convertAmountForDb(summary.refund_gross, currency),
      validationCount: summary.validation_count ?? null,
      validationFees: convertAmountForDb(summary.validation_fees, currency),
    });

    if (payload.summary) {
      const fees: TransferChargeFeeValues[] = (payload.summary.charge_fee_details ?? []).map(
        (fee) => ({
          amount: convertAmountForDb(fee.amount, fee.currency),
          currency: fee.currency,
          application: fee.application ?? '',
          description: fee.description ?? '',
          kind: fee.type,
        }),
      );
      await this.transfers.replaceChargeFees(transfer.id, fees);
    }

    this.logger.debug(
      { transferId: transfer.stripeId, status: transfer.status },
      'Transfer synced',
    );
    return transfer;
  }
}
