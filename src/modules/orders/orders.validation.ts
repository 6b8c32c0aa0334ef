import { z } from 'zod';

// Validation schemas for the Orders module
export const orderItemSchema = z.object({
  product_id: z.string(),
  name: z.string(),
  price: z.number(),
  quantity: z.number().int('Quantity must be a whole number').min(1, 'Quantity must be at least 1'),
});

export const orderSchema = z.object({
  buyer_email: z.string().email('Invalid email address'),
  buyer_name: z.string().min(1, 'Buyer name is required'),
  ign: z.string().nullish(),
  items: z.array(orderItemSchema),
  note: z.string().nullish(),
});

export type OrderRequest = z.infer<typeof orderSchema>;

// Canonical order returned by checkout and lookup
export const orderResponseSchema = z.object({
  id: z.string(),
  buyer_email: z.string(),
  buyer_name: z.string(),
  ign: z.string().nullish().transform((value) => value ?? null),
  items: z.array(orderItemSchema),
  total: z.number(),
  status: z.string(),
});
