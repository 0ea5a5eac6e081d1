/**
 * ConvoTrack Core - conversation lifecycle logic
 * Storage and framework agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/errors';

// Interfaces and contracts
export * from './interfaces';

// Signature verification and payload decoding
export * from './verification';
export * from './decoding';

// State machine
export * from './state-machine';

// Webhook processing pipeline
export * from './pipeline';

// Core services
export * from './services';
