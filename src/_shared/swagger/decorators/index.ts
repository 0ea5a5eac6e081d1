/**
 * Swagger decorators for the ConvoTrack API, one file per controller
 */

export * from './webhook.decorators';
export * from './conversation.decorators';
export * from './health.decorators';
