// Order Model - collection "order", items are embedded

import { OrderStatus } from '../../../constants';

export interface OrderItem {
  product_id: string; // not checked against the catalog
  name: string;
  price: number;
  quantity: number; // >= 1
}

export interface Order {
  id: string; // ObjectId hex
  buyer_email: string;
  buyer_name: string;
  ign: string | null; // in-game name
  items: OrderItem[];
  total: number; // sum of price * quantity, rounded to cents
  status: string; // stored as written, "pending" on creation
}

// Document written on checkout
export type CreateOrderInput = {
  buyer_email: string;
  buyer_name: string;
  ign: string | null;
  items: OrderItem[];
  total: number;
  status: OrderStatus;
  note: string | null;
};
