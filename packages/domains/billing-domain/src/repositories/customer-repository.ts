import type { Customer, CustomerValues } from '../entities/customer.js';

export interface CustomerRepository {
  findById(id: string): Promise<Customer | null>;
  findByStripeId(stripeId: string): Promise<Customer | null>;
  findByUserId(userId: string): Promise<Customer | null>;
  /** Insert, or update the row with the same stripe id. */
  upsert(values: CustomerValues): Promise<Customer>;
  update(id: string, patch: Partial<CustomerValues>): Promise<Customer>;
}
