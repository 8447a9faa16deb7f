/**
 * ChargeFlow Testing Utilities
 * In-memory adapters and deterministic time and randomness
 */
import {
  Clock,
  FixedClock,
  InFlightRegistry,
  PaymentService,
  RandomSource,
} from '../core';
import { InMemoryStorageAdapter } from '../adapters/storage/memory';
import {
  FixedRandomSource,
  SimulatedGatewayAdapter,
  SimulatedGatewayConfig,
} from '../adapters/gateway/simulated';

// In-memory and simulated adapters
export * from '../adapters/storage/memory';
export * from '../adapters/gateway/simulated';

// Re-export core for convenience in tests
export * from '../core';

export interface TestHarnessOptions {
  /**
   * Defaults to a source that approves every charge and refund
   */
  random?: RandomSource;
  clock?: Clock;
  gateway?: Partial<SimulatedGatewayConfig>;
  concurrency?: number;
}

export interface TestHarness {
  storage: InMemoryStorageAdapter;
  gateway: SimulatedGatewayAdapter;
  clock: Clock;
  inFlight: InFlightRegistry;
  service: PaymentService;
}

/**
 * Wire a PaymentService over in-memory storage and the simulated gateway
 */
export function createTestHarness(options: TestHarnessOptions = {}): TestHarness {
  const clock = options.clock ?? new FixedClock('2025-01-01T00:00:00.000Z');
  const storage = new InMemoryStorageAdapter();
  const gateway = new SimulatedGatewayAdapter(
    options.gateway,
    options.random ?? FixedRandomSource.alwaysSucceed(),
    clock,
  );
  const inFlight = new InFlightRegistry();
  const service = new PaymentService(storage, gateway, {
    clock,
    inFlight,
    concurrency: options.concurrency,
  });

  return { storage, gateway, clock, inFlight, service };
}
