export * from './conversation-status.enum';
export * from './counter-name.enum';
export * from './trigger-type.enum';
export * from './transition-outcome.enum';
export * from './processing-status.enum';
