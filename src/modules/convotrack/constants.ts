/**
 * Injection tokens for the ConvoTrack module
 */

export const CONVOTRACK_CONFIG = Symbol('CONVOTRACK_CONFIG');
export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');
export const LIFECYCLE_ENGINE = Symbol('LIFECYCLE_ENGINE');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
export const CONVERSATION_SERVICE = Symbol('CONVERSATION_SERVICE');
