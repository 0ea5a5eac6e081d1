export * from './conversation.model';
