import type {
  Invoice,
  InvoiceItem,
  InvoiceItemValues,
  InvoiceRepository,
  InvoiceValues,
} from '@billmirror/billing-domain';
import { invoiceItems, invoices } from '@billmirror/billing-domain/drizzle';
import type { Database } from '@billmirror/process-lib';
import { asc, desc, eq } from 'drizzle-orm';
import { single } from './rows.js';

export class DrizzleInvoiceRepository implements InvoiceRepository {
  constructor(private readonly db: Database) {}

  async upsert(values: InvoiceValues): Promise<Invoice> {
    const rows = await this.db
      .insert(invoices)
      .values(values)
      .onConflictDoUpdate({
        target: invoices.stripeId,
        set: { ...values, updatedAt: new Date() },
      })
      .returning();
    return single(rows, 'Invoice', values.stripeId);
  }

  async findByStripeId(stripeId: string): Promise<Invoice | null> {
    const [row] = await this.db
      .select()
      .from(invoices)
      .where(eq(invoices.stripeId, stripeId))
      .limit(1);
    return row ?? null;
  }

  async listByCustomer(customerId: string): Promise<Invoice[]> {
    return this.db
      .select()
      .from(invoices)
      .where(eq(invoices.customerId, customerId))
      .orderBy(desc(invoices.date));
  }

  async deleteItems(invoiceId: string): Promise<void> {
    await this.db.delete(invoiceItems).where(eq(invoiceItems.invoiceId, invoiceId));
  }

  async upsertItem(values: InvoiceItemValues): Promise<InvoiceItem> {
    const rows = await this.db
      .insert(invoiceItems)
      .values(values)
      .onConflictDoUpdate({
        target: [invoiceItems.invoiceId, invoiceItems.stripeId],
        set: values,
      })
      .returning();
    return single(rows, 'InvoiceItem', values.stripeId);
  }

  async listItems(invoiceId: string): Promise<InvoiceItem[]> {
    return this.db
      .select()
      .from(invoiceItems)
      .where(eq(invoiceItems.invoiceId, invoiceId))
      .orderBy(asc(invoiceItems.createdAt));
  }
}
