// Entities
export * from './entities/customer.js';
export * from './entities/event.js';
export * from './entities/invoice.js';
export * from './entities/plan.js';
export * from './entities/product.js';
export * from './entities/subscription.js';
export * from './entities/transfer.js';

// Value objects
export * from './value-objects/money.js';
export * from './value-objects/month-range.js';
export * from './value-objects/plan-catalog.js';

// Processor contract
export * from './processor/payloads.js';
export type * from './processor/billing-gateway.js';

// Repositories
export type * from './repositories/index.js';

// Services
export * from './services/catalog-sync.js';
export * from './services/charge-sync.js';
export * from './services/customer-service.js';
export * from './services/customer-sync.js';
export * from './services/event-processor.js';
export * from './services/invoice-service.js';
export * from './services/plan-sync.js';
export * from './services/receipt-hook.js';
export * from './services/reporting-service.js';
export * from './services/subscription-sync.js';
export * from './services/transfer-sync.js';

// Application
export * from './application/billing-actions.js';
export * from './billing-module.js';
