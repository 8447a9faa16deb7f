/**
 * ChargeFlow NestJS Module
 *
 * Main module for integrating ChargeFlow into NestJS applications
 */

// Main module
export { ChargeFlowModule } from './chargeflow.module';

// Configuration
export {
  ChargeFlowModuleConfig,
  ChargeFlowModuleAsyncConfig,
  defaultChargeFlowConfig,
  mergeChargeFlowConfig,
} from './chargeflow.config';
export { chargeFlowConfigFromEnv } from './chargeflow.env';

// Injection tokens
export * from './constants';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';
export { RecurringBillingProcessor } from './services/recurring-billing.processor';
