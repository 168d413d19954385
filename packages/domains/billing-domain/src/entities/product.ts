import type { products, skus } from '../../drizzle/schema.js';

export type Product = typeof products.$inferSelect;
export type ProductValues = Omit<typeof products.$inferInsert, 'id' | 'createdAt'>;

export type Sku = typeof skus.$inferSelect;
export type SkuValues = Omit<typeof skus.$inferInsert, 'id' | 'createdAt'>;
