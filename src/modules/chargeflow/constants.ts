/**
 * Injection tokens for ChargeFlow module
 */

export const CHARGEFLOW_CONFIG = Symbol('CHARGEFLOW_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const PAYMENT_GATEWAY = Symbol('PAYMENT_GATEWAY');
export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');
export const CLOCK = Symbol('CLOCK');
export const IN_FLIGHT_REGISTRY = Symbol('IN_FLIGHT_REGISTRY');
