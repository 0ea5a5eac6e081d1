// Interface and type exports
export * from './common.types';
export * from './conversation-store';
export * from './configuration.interface';
