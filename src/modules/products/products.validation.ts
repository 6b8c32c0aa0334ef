import { z } from 'zod';

// Validation schemas for the Products module
export const productSchema = z.object({
  name: z.string().min(1, 'Product name is required'),
  description: z.string().nullish(),
  price: z.number().nonnegative('Price must be 0 or more'),
  category: z.string().min(1, 'Category is required'),
  image: z.string().nullish(),
});

// Shape returned by GET /api/products, absent optionals come back as null
export const productResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish().transform((value) => value ?? null),
  price: z.number(),
  category: z.string(),
  image: z.string().nullish().transform((value) => value ?? null),
});
