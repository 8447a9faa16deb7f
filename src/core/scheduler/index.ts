export * from './in-flight-registry';
export * from './recurring-payment.scheduler';
