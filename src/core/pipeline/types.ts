import { ProcessingStatus, TransitionOutcome } from '../domain/enums';
import {
  ConversationStore,
  DecodedMessageEvent,
  LifecycleHooks,
} from '../interfaces';
import { ConversationLifecycleEngine } from '../state-machine';
import { WhatsAppPayloadDecoder } from '../decoding';
import { IncomingHeaders, SignatureVerifier } from '../verification';

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  rawBody: Buffer;
  headers: IncomingHeaders;
  receivedAt: Date;

  // Processing metadata
  processingId: string;
  /** Epoch ms after which no further event is started */
  deadline: number;

  // Verification results
  signatureValid?: boolean;

  // Decoded data
  events?: DecodedMessageEvent[];

  // Lifecycle results, one per decoded event
  eventResults: EventResult[];

  // Processing outcome
  processingStatus?: ProcessingStatus;
  error?: Error;
}

/**
 * Fate of one decoded message event
 */
export interface EventResult {
  senderId: string;
  messageTimestamp: number;
  outcome?: TransitionOutcome;
  error?: Error;
  /** Not attempted because the deadline passed; nothing was written */
  skipped?: boolean;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: WebhookContext;
  error?: Error;
  shouldContinue: boolean;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: WebhookContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  store: ConversationStore;
  engine?: ConversationLifecycleEngine;
  verifier?: SignatureVerifier;
  decoder?: WhatsAppPayloadDecoder;

  /** Used to build the verifier when none is given */
  appSecret?: string;

  hooks?: LifecycleHooks;

  timeoutMs?: number;
}

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  success: boolean;
  processingId: string;
  processingStatus: ProcessingStatus;
  eventResults: EventResult[];
  error?: Error;
  metrics: ProcessingMetrics;
}

/**
 * Processing metrics
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  signatureVerified: boolean;
  eventCount: number;
  failedEventCount: number;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public context: WebhookContext,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
