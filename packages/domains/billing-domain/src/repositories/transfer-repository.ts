import type {
  Transfer,
  TransferChargeFee,
  TransferChargeFeeValues,
  TransferValues,
} from '../entities/transfer.js';

export interface TransferRepository {
  upsert(values: TransferValues): Promise<Transfer>;
  findByStripeId(stripeId: string): Promise<Transfer | null>;
  replaceChargeFees(transferId: string, values: TransferChargeFeeValues[]): Promise<TransferChargeFee[]>;
  listChargeFees(transferId: string): Promise<TransferChargeFee[]>;
}
