/**
 * Document store collection names
 */
export const COLLECTIONS = {
  PRODUCT: 'product',
  ORDER: 'order',
  PAGE_CONTENT: 'pagecontent',
} as const;

export type CollectionName = typeof COLLECTIONS[keyof typeof COLLECTIONS];
