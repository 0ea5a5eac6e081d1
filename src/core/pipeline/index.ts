/**
 * Webhook Processing Pipeline
 *
 * 1. Verification - Validate webhook signature
 * 2. Decoding - Extract message events
 * 3. Lifecycle - Apply conversation transitions
 */

// Main processor
export { WebhookProcessor } from './webhook-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { VerificationStage } from './stages/verification.stage';
export { DecodingStage } from './stages/decoding.stage';
export { LifecycleStage } from './stages/lifecycle.stage';
