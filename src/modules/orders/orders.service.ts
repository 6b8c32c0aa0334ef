import { DocumentStore } from '../../connections/db/document-store';
import { CreateOrderInput, Order, OrderItem } from '../../connections/db/models';
import { COLLECTIONS, DEFAULT_ORDER_STATUS, roundMoney } from '../../constants';
import { AppError, BadRequestError, NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { serializeDocument } from '../../utils/serialize';
import { OrderRequest, orderResponseSchema } from './orders.validation';

/**
 * Sum of price * quantity over the items, rounded to cents.
 * Prices are taken from the request as submitted.
 */
export const calculateOrderTotal = (items: ReadonlyArray<Pick<OrderItem, 'price' | 'quantity'>>): number =>
  roundMoney(items.reduce((sum, item) => sum + item.price * item.quantity, 0));

export class OrdersService {
  constructor(private readonly store: DocumentStore) {}

  async createOrder(request: OrderRequest): Promise<Order> {
    if (request.items.length === 0) {
      throw new BadRequestError('Cart is empty', 'EMPTY_CART');
    }

    const data: CreateOrderInput = {
      buyer_email: request.buyer_email,
      buyer_name: request.buyer_name,
      ign: request.ign ?? null,
      items: request.items.map(({ product_id, name, price, quantity }) => ({ product_id, name, price, quantity })),
      total: calculateOrderTotal(request.items),
      status: DEFAULT_ORDER_STATUS,
      note: request.note ?? null,
    };

    const orderId = await this.store.insertOne(COLLECTIONS.ORDER, data);
    logger.info('Order created', { orderId, total: data.total, items: data.items.length });

    const saved = await this.store.findById(COLLECTIONS.ORDER, orderId);
    if (!saved) {
      throw new AppError(`Order ${orderId} was not found after saving`, 500, 'ORDER_NOT_PERSISTED');
    }
    return orderResponseSchema.parse(serializeDocument(saved));
  }

  async getOrderById(id: string): Promise<Order> {
    const doc = await this.store.findById(COLLECTIONS.ORDER, id);
    if (!doc) {
      throw new NotFoundError('Order not found');
    }
    return orderResponseSchema.parse(serializeDocument(doc));
  }
}
