/**
 * ChargeFlow Shared Resources
 *
 * DTOs and Swagger decorators used by the HTTP layer
 */

// Request and response DTOs
export * from './dto';

// Swagger decorators
export * from './swagger/decorators';
