import { type Logger, NotFoundError, isInvalidRequestMatching } from '@billmirror/domain-kernel';
import type { Metadata, PackageDimensions, SkuInventory } from '../../drizzle/schema.js';
import type { Product, Sku } from '../entities/product.js';
import type { BillingGateway, CreateSkuParams } from '../processor/billing-gateway.js';
import type { ProcessorProduct, ProcessorSku } from '../processor/payloads.js';
import type { CatalogRepository } from '../repositories/catalog-repository.js';
import { convertAmountForApi, convertAmountForDb, fromUnix } from '../value-objects/money.js';

export interface CreateSkuOptions {
  currency?: string;
  attributes?: Metadata;
  image?: string;
  metadata?: Metadata;
  packageDimensions?: PackageDimensions;
  active?: boolean;
}

/** Products and the SKUs sold under them. */
export class CatalogSync {
  constructor(
    private readonly gateway: BillingGateway,
    private readonly catalog: CatalogRepository,
    private readonly logger: Logger,
  ) {}

  async syncProducts(): Promise<number> {
    let count = 0;
    for await (const product of this.gateway.listProducts()) {
      await this.syncProduct(product);
      count += 1;
    }
    this.logger.info({ count }, 'Products synced');
    return count;
  }

  async syncProduct(payload: ProcessorProduct): Promise<Product> {
    return this.catalog.upsertProduct({
      stripeId: payload.id,
      name: payload.name,
      description: payload.description ?? '',
      active: payload.active,
      attributes: payload.attributes ?? [],
      metadata: payload.metadata,
      livemode: payload.livemode,
      updated: fromUnix(payload.updated),
    });
  }

  /**
   * Create a SKU at the processor and mirror it. `price` is in major units
   * (9.99 usd), converted to the processor's minor units.
   */
  async createSku(
    product: Product,
    price: number,
    inventory: SkuInventory,
    options: CreateSkuOptions = {},
  ): Promise<Sku> {
    const currency = options.currency ?? 'usd';
    const params: CreateSkuParams = {
      product: product.stripeId,
      price: convertAmountForApi(price, currency),
      inventory,
      currency,
    };
    if (options.attributes && Object.keys(options.attributes).length > 0) {
      params.attributes = options.attributes;
    }
    if (options.image) params.image = options.image;
    if (options.metadata && Object.keys(options.metadata).length > 0) {
      params.metadata = options.metadata;
    }
    if (options.packageDimensions) params.packageDimensions = options.packageDimensions;
    if (options.active ?? true) params.active = true;

    const payload = await this.gateway.createSku(params);
    return this.syncSkuFromStripeData(payload);
  }

  /** Null for an empty id or a SKU the processor no longer knows. */
  async retrieveSku(skuId: string | null | undefined): Promise<ProcessorSku | null> {
    if (!skuId) return null;
    try {
      return await this.gateway.retrieveSku(skuId);
    } catch (error) {
      if (isInvalidRequestMatching(error, 'No such sku')) return null;
      throw error;
    }
  }

  async syncSkus(): Promise<number> {
    let count = 0;
    for await (const sku of this.gateway.listSkus()) {
      await this.syncSkuFromStripeData(sku);
      count += 1;
    }
    this.logger.info({ count }, 'SKUs synced');
    return count;
  }

  /** Upsert a SKU. Its product must already be mirrored. */
  async syncSkuFromStripeData(payload: ProcessorSku): Promise<Sku> {
    const product = await this.catalog.findProductByStripeId(payload.product);
    if (!product) {
      throw new NotFoundError('Product', payload.product);
    }

    return this.catalog.upsertSku({
      stripeId: payload.id,
      productId: product.id,
      price: convertAmountForDb(payload.price, payload.currency),
      currency: payload.currency,
      attributes: payload.attributes,
      image: payload.image ?? '',
      inventory: {
        type: payload.inventory.type,
        quantity: payload.inventory.quantity ?? null,
        value: payload.inventory.value ?? null,
      },
      livemode: payload.livemode,
      metadata: payload.metadata,
      packageDimensions: payload.package_dimensions ?? null,
      active: payload.active,
      updated: fromUnix(payload.updated),
    });
  }

  async syncSkusFromProduct(product: Product): Promise<Sku[]> {
    const synced: Sku[] = [];
    for await (const sku of this.gateway.listProductSkus(product.stripeId)) {
      synced.push(await this.syncSkuFromStripeData(sku));
    }
    return synced;
  }
}
