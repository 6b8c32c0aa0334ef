import { z } from 'zod';

export const pageKeySchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z0-9_-]+$/i, 'Page key may only contain letters, digits, "-" and "_"');

export const pageResponseSchema = z.object({
  key: z.string(),
  title: z.string(),
  content: z.string(),
});
