export * from './order.constants';
export * from './collection.constants';
