import { Logger } from '@nestjs/common';
import { PipelineStage, WebhookContext, StageResult, EventResult } from '../types';
import { ProcessingStatus } from '../../domain/enums';
import { DecodedMessageEvent, LifecycleHooks } from '../../interfaces';
import { ConversationLifecycleEngine } from '../../state-machine';

/**
 * Stage 3: Lifecycle
 * Applies one transition per decoded event, in payload order.
 * A failed event is recorded and the remaining events still run. Once the
 * context deadline has passed no further event is started.
 */
export class LifecycleStage implements PipelineStage {
  name = 'lifecycle';
  private readonly logger = new Logger(LifecycleStage.name);

  constructor(
    private readonly engine: ConversationLifecycleEngine,
    private readonly hooks?: LifecycleHooks,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const events = context.events ?? [];

    for (const [index, event] of events.entries()) {
      const result: EventResult = {
        senderId: event.senderId,
        messageTimestamp: event.messageTimestamp,
      };

      if (Date.now() >= context.deadline) {
        this.skipRemaining(context, events.slice(index));
        break;
      }

      try {
        const transition = await this.engine.handleMessage(event);
        result.outcome = transition.outcome;
      } catch (error) {
        result.error = error instanceof Error ? error : new Error(String(error));
        this.logger.error(
          `[${context.processingId}] Failed to apply message from ${event.senderId}: ${result.error.message}`,
        );
        await this.reportError(result.error, context.processingId, event.senderId);
      }

      context.eventResults.push(result);
    }

    if (context.processingStatus === ProcessingStatus.TIMEOUT) {
      return { success: false, context, error: context.error, shouldContinue: true };
    }

    const failed = context.eventResults.filter((r) => r.error);
    if (failed.length > 0) {
      context.processingStatus = ProcessingStatus.PARTIALLY_FAILED;
      context.error = failed[0].error;
      return { success: false, context, error: context.error, shouldContinue: true };
    }

    context.processingStatus = ProcessingStatus.PROCESSED;
    return { success: true, context, shouldContinue: true };
  }

  private skipRemaining(
    context: WebhookContext,
    remaining: DecodedMessageEvent[],
  ): void {
    for (const event of remaining) {
      context.eventResults.push({
        senderId: event.senderId,
        messageTimestamp: event.messageTimestamp,
        skipped: true,
      });
    }

    context.processingStatus = ProcessingStatus.TIMEOUT;
    context.error = new Error(
      `Time budget exhausted; ${remaining.length} event(s) not applied`,
    );
    this.logger.warn(`[${context.processingId}] ${context.error.message}`);
  }

  private async reportError(
    error: Error,
    processingId: string,
    senderId: string,
  ): Promise<void> {
    if (!this.hooks?.onError) {
      return;
    }
    try {
      await this.hooks.onError(error, {
        operation: 'apply-message',
        processingId,
        senderId,
      });
    } catch (hookError) {
      this.logger.error(
        `onError hook failed: ${hookError instanceof Error ? hookError.message : String(hookError)}`,
      );
    }
  }
}
