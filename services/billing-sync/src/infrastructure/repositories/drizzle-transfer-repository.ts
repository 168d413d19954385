import type {
  Transfer,
  TransferChargeFee,
  TransferChargeFeeValues,
  TransferRepository,
  TransferValues,
} from '@billmirror/billing-domain';
import { transferChargeFees, transfers } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { eq } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleTransferRepository implements TransferRepository {
  constructor(private readonly db: Database) {}

  async upsert(values: TransferValues): Promise<Transfer> {
    const rows = await this.db
      .insert(transfers)
      .values(values)
      .onConflictDoUpdate({ target: transfers.stripeId, set: values })
      .returning();
    return single(rows, 'Transfer', values.stripeId);
  }

  async findByStripeId(stripeId: string): Promise<Transfer | null> {
    const [row] = await this.db
      .select()
      .from(transfers)
      .where(eq(transfers.stripeId, stripeId))
      .limit(1);
    return row ?? null;
  }

  async replaceChargeFees(
    transferId: string,
    values: TransferChargeFeeValues[],
  ): Promise<TransferChargeFee[]> {
    await this.db.delete(transferChargeFees).where(eq(transferChargeFees.transferId, transferId));
    if (values.length === 0) return [];
    return this.db
      .insert(transferChargeFees)
      .values(values.map((fee) => ({ ...fee, transferId })))
      .returning();
  }

  async listChargeFees(transferId: string): Promise<TransferChargeFee[]> {
    return this.db
      .select()
      .from(transferChargeFees)
      .where(eq(transferChargeFees.transferId, transferId));
  }
}
