export * from './command.types';
export * from './process-payment.command';
export * from './recurring-payment.command';
export * from './payment-command';
export * from './command-invoker';
