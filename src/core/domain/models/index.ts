export * from './payment.model';
export * from './subscription.model';
