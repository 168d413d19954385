import { z } from 'zod';
import type { customers } from '../../drizzle/schema.js';

export type Customer = typeof customers.$inferSelect;
export type CustomerValues = Omit<typeof customers.$inferInsert, 'id' | 'createdAt' | 'updatedAt'>;

/** The application user a customer belongs to. Authentication lives elsewhere. */
export const BillingUserSchema = z.object({
  id: z.string().min(1),
  email: z.string().email(),
});

export type BillingUser = z.infer<typeof BillingUserSchema>;

export interface CardDetails {
  fingerprint: string;
  last4: string;
  kind: string;
}

export const NO_CARD: CardDetails = { fingerprint: '', last4: '', kind: '' };

/** A customer can be charged when a full card is on file and it has not been purged. */
export function canCharge(
  customer: Pick<Customer, 'cardFingerprint' | 'cardLast4' | 'cardKind' | 'purgedAt'>,
): boolean {
  return (
    customer.cardFingerprint !== '' &&
    customer.cardLast4 !== '' &&
    customer.cardKind !== '' &&
    customer.purgedAt === null
  );
}
