import { ConfigService } from '@nestjs/config';
import { ChargeFlowModuleConfig } from './chargeflow.config';

const ENVIRONMENTS = ['development', 'staging', 'production', 'test'] as const;
type Environment = (typeof ENVIRONMENTS)[number];

function optionalNumber(config: ConfigService, key: string): number | undefined {
  const raw = config.get<string>(key);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function flag(config: ConfigService, key: string): boolean {
  return config.get<string>(key) === 'true';
}

function environment(config: ConfigService): Environment {
  const raw = config.get<string>('NODE_ENV');
  return ENVIRONMENTS.find((env) => env === raw) ?? 'development';
}

/**
 * Build module configuration from environment variables
 */
export function chargeFlowConfigFromEnv(
  config: ConfigService,
): ChargeFlowModuleConfig {
  const storage = config.get<string>('CHARGEFLOW_STORAGE') ?? 'memory';
  if (storage !== 'memory' && storage !== 'typeorm') {
    throw new Error(`CHARGEFLOW_STORAGE must be "memory" or "typeorm", got "${storage}"`);
  }

  return {
    storage: { type: storage },
    gateway: {
      successRate: optionalNumber(config, 'GATEWAY_SUCCESS_RATE'),
      refundSuccessRate: optionalNumber(config, 'GATEWAY_REFUND_SUCCESS_RATE'),
      latencyMs: optionalNumber(config, 'GATEWAY_LATENCY_MS'),
      seed: optionalNumber(config, 'GATEWAY_SEED'),
    },
    scheduler: {
      enabled: flag(config, 'SCHEDULER_ENABLED'),
      tickIntervalMs: optionalNumber(config, 'SCHEDULER_TICK_MS'),
      concurrency: optionalNumber(config, 'SCHEDULER_CONCURRENCY'),
      batchSize: optionalNumber(config, 'SCHEDULER_BATCH_SIZE'),
    },
    environment: environment(config),
    debug: flag(config, 'CHARGEFLOW_DEBUG'),
  };
}
