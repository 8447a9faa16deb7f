export * from './error-codes';
export * from './payment-engine.errors';
