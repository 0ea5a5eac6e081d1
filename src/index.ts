/**
 * ConvoTrack - WhatsApp conversation tracker
 *
 * Verifies WhatsApp Business webhook deliveries, moves each sender's
 * conversation through its lifecycle and keeps running counters.
 */
import 'reflect-metadata';

// Core components
export * from './core';

// Storage adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export { SerialQueue } from './adapters/storage/serial-queue';

// NestJS module, controllers and injection tokens
export * from './modules';

// DTOs and Swagger decorators
export * from './_shared/dto';
export * from './_shared/swagger/decorators';

// Testing utilities
export * from './_shared/testing/whatsapp-webhook.factory';

// Environment validation
export {
  EnvironmentVariables,
  validateEnvironment,
} from './config/env.validation';
