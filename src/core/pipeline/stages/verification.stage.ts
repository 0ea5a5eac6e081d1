import { PipelineStage, WebhookContext, StageResult } from '../types';
import { ProcessingStatus } from '../../domain/enums';
import {
  ConfigurationError,
  SignatureVerificationError,
} from '../../domain/errors';
import { SignatureVerifier } from '../../verification';

/**
 * Stage 1: Signature Verification
 * Rejects the delivery before any decoding or state mutation
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(private readonly verifier: SignatureVerifier) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    try {
      this.verifier.verify(
        context.rawBody,
        SignatureVerifier.extractHeader(context.headers),
      );
      context.signatureValid = true;

      return { success: true, context, shouldContinue: true };
    } catch (error) {
      context.signatureValid = false;

      if (error instanceof ConfigurationError) {
        context.processingStatus = ProcessingStatus.CONFIGURATION_ERROR;
      } else if (error instanceof SignatureVerificationError) {
        context.processingStatus = ProcessingStatus.SIGNATURE_FAILED;
      } else {
        throw error;
      }

      context.error = error;
      return { success: false, context, error, shouldContinue: false };
    }
  }
}
