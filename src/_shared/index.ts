/**
 * ConvoTrack Shared Resources
 *
 * Centralized exports for all shared components used across the application
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators
export * from './swagger/decorators';

// Testing utilities
export * from './testing/whatsapp-webhook.factory';
