import type { transferChargeFees, transfers } from '../../drizzle/schema.js';

export type Transfer = typeof transfers.$inferSelect;
export type TransferValues = Omit<typeof transfers.$inferInsert, 'id' | 'createdAt'>;

export type TransferChargeFee = typeof transferChargeFees.$inferSelect;
export type TransferChargeFeeValues = Omit<
  typeof transferChargeFees.$inferInsert,
  'id' | 'transferId' | 'createdAt'
>;
