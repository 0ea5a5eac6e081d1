export * from './conversation-lifecycle-engine';
export * from './types';
export * from './transition-rules';
