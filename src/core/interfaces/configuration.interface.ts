import { ProcessingStatus, TransitionOutcome, TriggerType } from '../domain/enums';

/**
 * Lifecycle hooks for monitoring
 */
export interface LifecycleHooks {
  /**
   * Called once per webhook delivery after its fate is known
   */
  onWebhookFate?: (event: WebhookFateEvent) => void | Promise<void>;

  /**
   * Called after every committed lifecycle transition
   */
  onTransition?: (event: TransitionEvent) => void | Promise<void>;

  /**
   * Called when a delivery or event fails
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

export interface WebhookFateEvent {
  processingId: string;
  processingStatus: ProcessingStatus;
  eventCount: number;
  failedEventCount: number;
  latencyMs: number;
  error?: Error;
}

export interface TransitionEvent {
  senderId: string;
  triggerType: TriggerType;
  outcome: TransitionOutcome;
  timestamp: number;
}

export interface ErrorContext {
  operation: string;
  processingId?: string;
  senderId?: string;
}
