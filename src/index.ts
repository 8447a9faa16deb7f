/**
 * ChargeFlow - Payment Command Engine
 *
 * Charges, refunds and recurring billing expressed as undoable commands,
 * with a storage and gateway agnostic core.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/memory';
export * from './adapters/storage/typeorm';
export * from './adapters/gateway/simulated';

// Export NestJS module, services, controllers and injection tokens
export * from './modules/chargeflow';

// Export DTOs and Swagger decorators
export * from './_shared';
