import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  PipelineConfig,
  PipelineStage,
  WebhookContext,
  ProcessingResult,
  ProcessingMetrics,
  PipelineError,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { DecodingStage } from './stages/decoding.stage';
import { LifecycleStage } from './stages/lifecycle.stage';
import { ProcessingStatus } from '../domain/enums';
import { LifecycleHooks } from '../interfaces';
import { ConversationLifecycleEngine } from '../state-machine';
import { WhatsAppPayloadDecoder } from '../decoding';
import { IncomingHeaders, SignatureVerifier } from '../verification';

const DEFAULT_TIMEOUT_MS = 10000;

/**
 * WebhookProcessor orchestrates the processing pipeline
 *
 * Pipeline stages:
 * 1. Verification - HMAC signature of the raw body
 * 2. Decoding - payload to message events
 * 3. Lifecycle - one transition per event
 *
 * The time budget is checked before each event. A transition that has
 * started always runs to commit or rollback, so the result never reports
 * work that lands after the response.
 */
export class WebhookProcessor {
  private readonly logger = new Logger(WebhookProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;
  private readonly timeoutMs: number;

  constructor(config: PipelineConfig) {
    this.hooks = config.hooks;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stages = [
      new VerificationStage(
        config.verifier ?? new SignatureVerifier(config.appSecret),
      ),
      new DecodingStage(config.decoder ?? new WhatsAppPayloadDecoder()),
      new LifecycleStage(
        config.engine ??
          new ConversationLifecycleEngine(config.store, { hooks: config.hooks }),
        config.hooks,
      ),
    ];
  }

  /**
   * Process one webhook delivery through the pipeline
   */
  async processWebhook(
    rawBody: Buffer,
    headers: IncomingHeaders,
  ): Promise<ProcessingResult> {
    const startTime = Date.now();

    const context: WebhookContext = {
      rawBody,
      headers,
      receivedAt: new Date(),
      processingId: uuidv4(),
      deadline: startTime + this.timeoutMs,
      eventResults: [],
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      signatureVerified: false,
      eventCount: 0,
      failedEventCount: 0,
    };

    try {
      await this.executePipeline(context, metrics);
    } catch (error) {
      context.error = error instanceof Error ? error : new Error(String(error));
      context.processingStatus ??= ProcessingStatus.PARTIALLY_FAILED;
      this.logger.error(
        `[${context.processingId}] Pipeline error: ${context.error.message}`,
        context.error.stack,
      );
      await this.reportError(context);
    }

    const processingStatus =
      context.processingStatus ?? ProcessingStatus.PROCESSED;
    metrics.totalDurationMs = Date.now() - startTime;
    metrics.eventCount = context.events?.length ?? 0;
    metrics.failedEventCount = context.eventResults.filter(
      (r) => r.error || r.skipped,
    ).length;

    this.logger.log(
      `[${context.processingId}] ${processingStatus}: ${metrics.eventCount} event(s), ${metrics.failedEventCount} failed, ${metrics.totalDurationMs}ms`,
    );

    await this.reportFate(context, processingStatus, metrics);

    return {
      success: processingStatus === ProcessingStatus.PROCESSED,
      processingId: context.processingId,
      processingStatus,
      eventResults: [...context.eventResults],
      error: context.error,
      metrics,
    };
  }

  getStatistics(): { stages: string[]; timeoutMs: number } {
    return {
      stages: this.stages.map((s) => s.name),
      timeoutMs: this.timeoutMs,
    };
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private async executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (stage.name === 'verification') {
          metrics.signatureVerified = result.success;
        }

        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }
    }
  }

  private async reportFate(
    context: WebhookContext,
    processingStatus: ProcessingStatus,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    if (!this.hooks?.onWebhookFate) {
      return;
    }
    try {
      await this.hooks.onWebhookFate({
        processingId: context.processingId,
        processingStatus,
        eventCount: metrics.eventCount,
        failedEventCount: metrics.failedEventCount,
        latencyMs: metrics.totalDurationMs,
        error: context.error,
      });
    } catch (error) {
      this.logger.error(
        `onWebhookFate hook failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async reportError(context: WebhookContext): Promise<void> {
    if (!this.hooks?.onError || !context.error) {
      return;
    }
    try {
      await this.hooks.onError(context.error, {
        operation: 'webhook-processing',
        processingId: context.processingId,
      });
    } catch (error) {
      this.logger.error(
        `onError hook failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
