/**
 * ChargeFlow core - commands, scheduling and domain rules.
 * Storage and gateway agnostic; adapters live under src/adapters.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects/money.vo';
export * from './domain/value-objects/currencies';

// Errors
export * from './errors';

// Interfaces and contracts
export * from './interfaces';

// State machine
export * from './state-machine';

// Time
export * from './clock';

// Helpers
export * from './utils';

// Commands and invoker
export * from './commands';

// Recurring billing
export * from './scheduler';

// Core services
export * from './services';
