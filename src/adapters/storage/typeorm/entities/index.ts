export * from './column-transformers';
export * from './payment.entity';
export * from './subscription.entity';
