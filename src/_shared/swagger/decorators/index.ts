/**
 * Centralized Swagger decorators for the ChargeFlow API
 * Shared by the payment, subscription and health controllers
 */

export * from './payment.decorators';
export * from './subscription.decorators';
export * from './health.decorators';
