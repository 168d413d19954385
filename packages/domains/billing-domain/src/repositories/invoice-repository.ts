import type { Invoice, InvoiceItem, InvoiceItemValues, InvoiceValues } from '../entities/invoice.js';

export interface InvoiceRepository {
  upsert(values: InvoiceValues): Promise<Invoice>;
  findByStripeId(stripeId: string): Promise<Invoice | null>;
  listByCustomer(customerId: string): Promise<Invoice[]>;

  deleteItems(invoiceId: string): Promise<void>;
  /** Insert, or update the item with the same (invoice, stripe id). */
  upsertItem(values: InvoiceItemValues): Promise<InvoiceItem>;
  listItems(invoiceId: string): Promise<InvoiceItem[]>;
}
