export * from './conversation.service';
