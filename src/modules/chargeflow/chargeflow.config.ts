import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { DataSourceOptions } from 'typeorm';
import {
  Clock,
  PaymentGatewayAdapter,
  RandomSource,
  StorageAdapter,
} from '../../core';

/**
 * ChargeFlow Module Configuration
 */
export interface ChargeFlowModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: DataSourceOptions;
    adapter?: StorageAdapter;
  };

  /**
   * Gateway configuration
   *
   * Without `adapter` the simulated gateway is used with the rates below.
   */
  gateway?: {
    adapter?: PaymentGatewayAdapter;
    /**
     * Charge success probability, 0..1
     * Default: 0.9
     */
    successRate?: number;
    /**
     * Refund success probability, 0..1
     * Default: 0.9
     */
    refundSuccessRate?: number;
    /**
     * Simulated latency per gateway call
     * Default: 0
     */
    latencyMs?: number;
    /**
     * Seed for a deterministic outcome sequence
     */
    seed?: number;
    /**
     * Explicit randomness, wins over `seed`
     */
    random?: RandomSource;
  };

  /**
   * Recurring billing configuration
   */
  scheduler?: {
    /**
     * Run ticks on a timer inside this process
     * Default: false
     */
    enabled?: boolean;
    tickIntervalMs?: number;
    /**
     * Subscriptions charged at the same time within a tick
     */
    concurrency?: number;
    /**
     * Due subscriptions picked up per tick
     */
    batchSize?: number;
  };

  /**
   * Time source, mostly for tests
   */
  clock?: Clock;

  /**
   * Environment-specific settings
   */
  environment?: 'development' | 'staging' | 'production' | 'test';
  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface ChargeFlowModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<ChargeFlowModuleConfig>['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultChargeFlowConfig: Required<
  Pick<ChargeFlowModuleConfig, 'gateway' | 'scheduler' | 'environment' | 'debug'>
> = {
  gateway: {
    successRate: 0.9,
    refundSuccessRate: 0.9,
    latencyMs: 0,
  },
  scheduler: {
    enabled: false,
    tickIntervalMs: 60000,
    concurrency: 1,
    batchSize: 100,
  },
  environment: 'development',
  debug: false,
};

/**
 * Fill in defaults section by section
 */
export function mergeChargeFlowConfig(
  config: ChargeFlowModuleConfig,
): ChargeFlowModuleConfig {
  return {
    ...defaultChargeFlowConfig,
    ...config,
    gateway: { ...defaultChargeFlowConfig.gateway, ...config.gateway },
    scheduler: { ...defaultChargeFlowConfig.scheduler, ...config.scheduler },
  };
}
