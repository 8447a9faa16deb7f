import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  ChargeFlowModuleConfig,
  ChargeFlowModuleAsyncConfig,
  mergeChargeFlowConfig,
} from './chargeflow.config';
import {
  Clock,
  InFlightRegistry,
  PaymentGatewayAdapter,
  PaymentService,
  RandomSource,
  StorageAdapter,
  SystemClock,
} from '../../core';
import { InMemoryStorageAdapter } from '../../adapters/storage/memory';
import {
  TypeORMStorageAdapter,
  createDataSource,
} from '../../adapters/storage/typeorm';
import {
  MathRandomSource,
  SeededRandomSource,
  SimulatedGatewayAdapter,
} from '../../adapters/gateway/simulated';
import {
  CHARGEFLOW_CONFIG,
  CLOCK,
  IN_FLIGHT_REGISTRY,
  PAYMENT_GATEWAY,
  RANDOM_SOURCE,
  STORAGE_ADAPTER,
} from './constants';
import { PaymentController } from './controllers/payment.controller';
import { SubscriptionController } from './controllers/subscription.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { RecurringBillingProcessor } from './services/recurring-billing.processor';

const EXPORTED_PROVIDERS = [
  CHARGEFLOW_CONFIG,
  STORAGE_ADAPTER,
  PAYMENT_GATEWAY,
  CLOCK,
  IN_FLIGHT_REGISTRY,
  PaymentService,
  ConfigurationService,
  RecurringBillingProcessor,
];

/**
 * ChargeFlow Module - Main NestJS Module
 *
 * Provides dependency injection and configuration for ChargeFlow
 */
@Global()
@Module({})
export class ChargeFlowModule {
  /**
   * Configure ChargeFlow synchronously
   */
  static forRoot(config: ChargeFlowModuleConfig): DynamicModule {
    return {
      module: ChargeFlowModule,
      providers: [
        {
          provide: CHARGEFLOW_CONFIG,
          useValue: mergeChargeFlowConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [PaymentController, SubscriptionController, HealthController],
      exports: EXPORTED_PROVIDERS,
    };
  }

  /**
   * Configure ChargeFlow asynchronously
   */
  static forRootAsync(options: ChargeFlowModuleAsyncConfig): DynamicModule {
    return {
      module: ChargeFlowModule,
      imports: options.imports || [],
      providers: [
        {
          provide: CHARGEFLOW_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeChargeFlowConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [PaymentController, SubscriptionController, HealthController],
      exports: EXPORTED_PROVIDERS,
    };
  }

  /**
   * Providers built from the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: CLOCK,
        useFactory: (config: ChargeFlowModuleConfig): Clock =>
          config.clock ?? new SystemClock(),
        inject: [CHARGEFLOW_CONFIG],
      },
      {
        provide: RANDOM_SOURCE,
        useFactory: (config: ChargeFlowModuleConfig): RandomSource => {
          if (config.gateway?.random) {
            return config.gateway.random;
          }
          if (config.gateway?.seed !== undefined) {
            return new SeededRandomSource(config.gateway.seed);
          }
          return new MathRandomSource();
        },
        inject: [CHARGEFLOW_CONFIG],
      },
      {
        provide: PAYMENT_GATEWAY,
        useFactory: (
          config: ChargeFlowModuleConfig,
          random: RandomSource,
          clock: Clock,
        ): PaymentGatewayAdapter =>
          config.gateway?.adapter ??
          new SimulatedGatewayAdapter(
            {
              successRate: config.gateway?.successRate,
              refundSuccessRate: config.gateway?.refundSuccessRate,
              latencyMs: config.gateway?.latencyMs,
            },
            random,
            clock,
          ),
        inject: [CHARGEFLOW_CONFIG, RANDOM_SOURCE, CLOCK],
      },
      {
        provide: STORAGE_ADAPTER,
        useFactory: async (
          config: ChargeFlowModuleConfig,
        ): Promise<StorageAdapter> => {
          switch (config.storage.type) {
            case 'memory':
              return new InMemoryStorageAdapter();

            case 'typeorm': {
              const dataSource = createDataSource(config.storage.options);
              await dataSource.initialize();
              return new TypeORMStorageAdapter(dataSource);
            }

            case 'custom':
              if (!config.storage.adapter) {
                throw new Error('Custom storage adapter not provided');
              }
              return config.storage.adapter;

            default:
              throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
          }
        },
        inject: [CHARGEFLOW_CONFIG],
      },
      {
        provide: IN_FLIGHT_REGISTRY,
        useFactory: () => new InFlightRegistry(),
      },
      {
        provide: PaymentService,
        useFactory: (
          config: ChargeFlowModuleConfig,
          storage: StorageAdapter,
          gateway: PaymentGatewayAdapter,
          clock: Clock,
          inFlight: InFlightRegistry,
        ) =>
          new PaymentService(storage, gateway, {
            clock,
            inFlight,
            concurrency: config.scheduler?.concurrency,
            batchSize: config.scheduler?.batchSize,
          }),
        inject: [
          CHARGEFLOW_CONFIG,
          STORAGE_ADAPTER,
          PAYMENT_GATEWAY,
          CLOCK,
          IN_FLIGHT_REGISTRY,
        ],
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
      {
        provide: RecurringBillingProcessor,
        useClass: RecurringBillingProcessor,
      },
    ];
  }
}
