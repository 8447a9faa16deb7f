import { Injectable, Inject } from '@nestjs/common';
import type { ChargeFlowModuleConfig } from '../chargeflow.config';
import { CHARGEFLOW_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to ChargeFlow configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(CHARGEFLOW_CONFIG)
    private readonly config: ChargeFlowModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): ChargeFlowModuleConfig {
    return this.config;
  }

  getStorageType(): ChargeFlowModuleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  /**
   * Check if the recurring billing timer should run
   */
  isSchedulerEnabled(): boolean {
    return this.config.scheduler?.enabled === true;
  }

  getTickIntervalMs(): number {
    return this.config.scheduler?.tickIntervalMs ?? 60000;
  }

  getSchedulerConcurrency(): number {
    return this.config.scheduler?.concurrency ?? 1;
  }

  getSchedulerBatchSize(): number {
    return this.config.scheduler?.batchSize ?? 100;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug === true;
  }

  /**
   * Get environment
   */
  getEnvironment(): string {
    return this.config.environment || 'development';
  }
}
