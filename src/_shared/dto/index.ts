/**
 * Centralized DTOs for the ConvoTrack API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './conversation.dto';
export * from './webhook.dto';
