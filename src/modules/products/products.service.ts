import { DocumentStore } from '../../connections/db/document-store';
import { CreateProductInput, Product } from '../../connections/db/models';
import { COLLECTIONS } from '../../constants';
import { logger } from '../../utils/logging';
import { serializeDocument } from '../../utils/serialize';
import { DEFAULT_PRODUCTS } from './products.seed';
import { productResponseSchema, productSchema } from './products.validation';

export class ProductsService {
  // shared by concurrent callers so an empty catalog is seeded only once
  private seeding: Promise<void> | null = null;

  constructor(
    private readonly store: DocumentStore,
    private readonly seedProducts: readonly CreateProductInput[] = DEFAULT_PRODUCTS
  ) {}

  /**
   * Insert the default catalog if the product collection is empty
   */
  ensureSeedProducts(): Promise<void> {
    if (!this.seeding) {
      this.seeding = this.seedIfEmpty().finally(() => {
        this.seeding = null;
      });
    }
    return this.seeding;
  }

  private async seedIfEmpty(): Promise<void> {
    const count = await this.store.count(COLLECTIONS.PRODUCT);
    if (count > 0) {
      return;
    }

    const products = this.seedProducts.map((product) => productSchema.parse(product));
    const ids = await this.store.insertMany(COLLECTIONS.PRODUCT, products);
    logger.info('Seeded default products', { count: ids.length });
  }

  async listProducts(): Promise<Product[]> {
    await this.ensureSeedProducts();
    const docs = await this.store.find(COLLECTIONS.PRODUCT);
    return docs.map((doc) => productResponseSchema.parse(serializeDocument(doc)));
  }
}
