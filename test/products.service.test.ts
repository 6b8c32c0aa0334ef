import { describe, it, expect, beforeEach } from 'vitest';
import { ProductsService } from '../src/modules/products/products.service';
import { DEFAULT_PRODUCTS } from '../src/modules/products/products.seed';
import { MemoryDocumentStore } from './support/memory-document-store';

describe('ProductsService', () => {
  let store: MemoryDocumentStore;
  let service: ProductsService;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    service = new ProductsService(store);
  });

  it('seeds the four default products into an empty catalog', async () => {
    const products = await service.listProducts();

    expect(products.map((product) => product.name)).toEqual([
      'Diamond Sword',
      'Enchanted Pickaxe',
      'Netherite Armor Set',
      'VIP Rank (30 Days)',
    ]);
    expect(products[0]).toEqual({
      id: store.documents('product')[0]._id.toHexString(),
      name: 'Diamond Sword',
      description: 'Sharp V ready! Deal massive damage.',
      price: 12.99,
      category: 'Weapons',
      image: '/items/diamond_sword.png',
    });
    expect(store.insertManyCalls).toBe(1);
  });

  it('does not seed again on repeated listing', async () => {
    await service.listProducts();
    await service.listProducts();
    const products = await service.listProducts();

    expect(products).toHaveLength(DEFAULT_PRODUCTS.length);
    expect(store.documents('product')).toHaveLength(4);
    expect(store.insertManyCalls).toBe(1);
  });

  it('shares one seeding run between concurrent callers', async () => {
    const [first, second] = await Promise.all([service.listProducts(), service.listProducts()]);

    expect(first).toHaveLength(4);
    expect(second).toHaveLength(4);
    expect(store.insertManyCalls).toBe(1);
  });

  it('leaves a non-empty catalog alone', async () => {
    await store.insertOne('product', { name: 'Golden Apple', price: 2.5, category: 'Food' });

    const products = await service.listProducts();

    expect(products).toEqual([
      {
        id: store.documents('product')[0]._id.toHexString(),
        name: 'Golden Apple',
        description: null,
        price: 2.5,
        category: 'Food',
        image: null,
      },
    ]);
    expect(store.insertManyCalls).toBe(0);
  });

  it('stamps seeded products but keeps timestamps out of the response', async () => {
    const [product] = await service.listProducts();

    expect(store.documents('product')[0].created_at).toBeInstanceOf(Date);
    expect(Object.keys(product).sort()).toEqual(['category', 'description', 'id', 'image', 'name', 'price']);
  });

  it('propagates store failures', async () => {
    store.failWith = new Error('connection refused');

    await expect(service.listProducts()).rejects.toThrow('connection refused');
  });

  it('can retry seeding after a failed attempt', async () => {
    store.failWith = new Error('connection refused');
    await expect(service.listProducts()).rejects.toThrow('connection refused');

    store.failWith = null;
    await expect(service.listProducts()).resolves.toHaveLength(4);
  });
});
