/**
 * Centralized DTOs for the ChargeFlow API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './payment.dto';
export * from './subscription.dto';
