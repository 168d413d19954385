import type { Charge, ChargeValues } from '../entities/invoice.js';

export interface ChargeRepository {
  upsert(values: ChargeValues): Promise<Charge>;
  findByStripeId(stripeId: string): Promise<Charge | null>;
  update(id: string, patch: Partial<ChargeValues>): Promise<Charge>;
}
