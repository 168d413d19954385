import type { charges, invoiceItems, invoices } from '../../drizzle/schema.js';

export type Invoice = typeof invoices.$inferSelect;
export type InvoiceValues = Omit<typeof invoices.$inferInsert, 'id' | 'createdAt' | 'updatedAt'>;

export type InvoiceItem = typeof invoiceItems.$inferSelect;
export type InvoiceItemValues = Omit<typeof invoiceItems.$inferInsert, 'id' | 'createdAt'>;

export type Charge = typeof charges.$inferSelect;
export type ChargeValues = Omit<typeof charges.$inferInsert, 'id' | 'createdAt'>;

/** An invoice that can still be paid: neither paid nor closed. */
export function isPayable(invoice: Pick<Invoice, 'paid' | 'closed'>): boolean {
  return !invoice.paid && !invoice.closed;
}
