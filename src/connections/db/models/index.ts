export * from './product.model';
export * from './order.model';
export * from './page-content.model';
