export { WebhookController } from './webhook.controller';
export { ConversationController } from './conversation.controller';
export { HealthController } from './health.controller';
