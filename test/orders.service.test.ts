import { describe, it, expect, beforeEach } from 'vitest';
import { mongo } from 'mongoose';
import { OrdersService, calculateOrderTotal } from '../src/modules/orders/orders.service';
import { BadRequestError, NotFoundError } from '../src/utils/errors';
import { MemoryDocumentStore } from './support/memory-document-store';

const checkout = {
  buyer_email: 'steve@example.com',
  buyer_name: 'Steve',
  ign: 'Steve_MC',
  items: [
    { product_id: 'p-1', name: 'Diamond Sword', price: 10, quantity: 2 },
    { product_id: 'p-2', name: 'Enchanted Pickaxe', price: 5, quantity: 1 },
  ],
  note: 'deliver at spawn',
};

describe('calculateOrderTotal', () => {
  it('sums price times quantity', () => {
    expect(calculateOrderTotal(checkout.items)).toBe(25);
  });

  it('rounds to cents', () => {
    expect(calculateOrderTotal([{ price: 0.1, quantity: 3 }])).toBe(0.3);
    expect(calculateOrderTotal([{ price: 10.49, quantity: 3 }, { price: 12.99, quantity: 1 }])).toBe(44.46);
  });

  it('rounds the exact binary value of sums just below a half cent', () => {
    expect(calculateOrderTotal([{ price: 1.005, quantity: 1 }])).toBe(1);
    expect(calculateOrderTotal([{ price: 2.675, quantity: 1 }])).toBe(2.67);
  });

  it('sends exact half-cent ties to the even cent', () => {
    expect(calculateOrderTotal([{ price: 0.125, quantity: 1 }])).toBe(0.12);
    expect(calculateOrderTotal([{ price: 0.375, quantity: 1 }])).toBe(0.38);
    expect(calculateOrderTotal([{ price: 0.0625, quantity: 2 }])).toBe(0.12);
  });

  it('is zero for no items', () => {
    expect(calculateOrderTotal([])).toBe(0);
  });
});

describe('OrdersService', () => {
  let store: MemoryDocumentStore;
  let service: OrdersService;

  beforeEach(() => {
    store = new MemoryDocumentStore();
    service = new OrdersService(store);
  });

  it('persists a pending order and returns the stored representation', async () => {
    const order = await service.createOrder(checkout);

    expect(order).toEqual({
      id: store.documents('order')[0]._id.toHexString(),
      buyer_email: 'steve@example.com',
      buyer_name: 'Steve',
      ign: 'Steve_MC',
      items: checkout.items,
      total: 25,
      status: 'pending',
    });
  });

  it('stores the checkout note without returning it', async () => {
    const order = await service.createOrder(checkout);

    expect(store.documents('order')[0].note).toBe('deliver at spawn');
    expect(order).not.toHaveProperty('note');
  });

  it('defaults a missing in-game name to null', async () => {
    const order = await service.createOrder({ ...checkout, ign: undefined, note: undefined });

    expect(order.ign).toBeNull();
    expect(store.documents('order')[0].note).toBeNull();
  });

  it('rejects an empty cart without writing anything', async () => {
    await expect(service.createOrder({ ...checkout, items: [] })).rejects.toThrow(BadRequestError);
    await expect(service.createOrder({ ...checkout, items: [] })).rejects.toThrow('Cart is empty');
    expect(store.documents('order')).toHaveLength(0);
  });

  it('returns the same items and total on lookup', async () => {
    const created = await service.createOrder(checkout);

    const fetched = await service.getOrderById(created.id);

    expect(fetched).toEqual(created);
  });

  it('raises NotFoundError for an unknown id', async () => {
    await expect(service.getOrderById(new mongo.ObjectId().toHexString())).rejects.toThrow(NotFoundError);
  });

  it('raises BadRequestError for a malformed id', async () => {
    await expect(service.getOrderById('12345')).rejects.toThrow(BadRequestError);
  });
});
