export { ConversationEntity } from './conversation.entity';
export { CounterEntity } from './counter.entity';
