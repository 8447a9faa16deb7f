import { ConfigService } from '@nestjs/config';
import {
  ConfigurationService,
  chargeFlowConfigFromEnv,
  mergeChargeFlowConfig,
} from '../../src';

describe('chargeFlowConfigFromEnv', () => {
  it('reads gateway and scheduler settings', () => {
    const config = chargeFlowConfigFromEnv(
      new ConfigService({
        CHARGEFLOW_STORAGE: 'typeorm',
        GATEWAY_SUCCESS_RATE: '0.75',
        GATEWAY_SEED: '42',
        SCHEDULER_ENABLED: 'true',
        SCHEDULER_TICK_MS: '5000',
        NODE_ENV: 'test',
      }),
    );

    expect(config.storage).toEqual({ type: 'typeorm' });
    expect(config.gateway).toEqual({
      successRate: 0.75,
      refundSuccessRate: undefined,
      latencyMs: undefined,
      seed: 42,
    });
    expect(config.scheduler).toEqual({
      enabled: true,
      tickIntervalMs: 5000,
      concurrency: undefined,
      batchSize: undefined,
    });
    expect(config.environment).toBe('test');
  });

  it('rejects unknown storage types', () => {
    expect(() =>
      chargeFlowConfigFromEnv(new ConfigService({ CHARGEFLOW_STORAGE: 'redis' })),
    ).toThrow('CHARGEFLOW_STORAGE must be "memory" or "typeorm", got "redis"');
  });

  it('rejects non-numeric values', () => {
    expect(() =>
      chargeFlowConfigFromEnv(new ConfigService({ GATEWAY_LATENCY_MS: 'fast' })),
    ).toThrow('GATEWAY_LATENCY_MS must be a number, got "fast"');
  });
});

describe('mergeChargeFlowConfig', () => {
  it('fills in section defaults', () => {
    const merged = mergeChargeFlowConfig({
      storage: { type: 'memory' },
      scheduler: { enabled: true },
    });

    expect(merged.scheduler).toEqual({
      enabled: true,
      tickIntervalMs: 60000,
      concurrency: 1,
      batchSize: 100,
    });
    expect(merged.gateway?.successRate).toBe(0.9);
    expect(merged.environment).toBe('development');
  });

  it('backs ConfigurationService', () => {
    const service = new ConfigurationService(
      mergeChargeFlowConfig({
        storage: { type: 'memory' },
        scheduler: { tickIntervalMs: 1000 },
      }),
    );

    expect(service.getStorageType()).toBe('memory');
    expect(service.isSchedulerEnabled()).toBe(false);
    expect(service.getTickIntervalMs()).toBe(1000);
    expect(service.getSchedulerBatchSize()).toBe(100);
  });
});
