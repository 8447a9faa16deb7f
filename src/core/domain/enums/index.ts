export * from './payment-status.enum';
export * from './subscription-status.enum';
export * from './billing-interval.enum';
export * from './command-kind.enum';
