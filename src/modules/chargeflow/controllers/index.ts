/**
 * ChargeFlow Controllers
 */

export { PaymentController } from './payment.controller';
export { SubscriptionController } from './subscription.controller';
export { HealthController } from './health.controller';
export { toHttpException, rethrowAsHttp } from './engine-error.mapper';
