import { PipelineStage, WebhookContext, StageResult } from '../types';
import { ProcessingStatus } from '../../domain/enums';
import { MalformedPayloadError } from '../../domain/errors';
import { WhatsAppPayloadDecoder } from '../../decoding';

/**
 * Stage 2: Decoding
 * Maps the webhook body to message events; only an unparseable body stops here
 */
export class DecodingStage implements PipelineStage {
  name = 'decoding';

  constructor(private readonly decoder: WhatsAppPayloadDecoder) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    try {
      context.events = this.decoder.decodeBody(context.rawBody);
      return { success: true, context, shouldContinue: true };
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) {
        throw error;
      }

      context.events = [];
      context.processingStatus = ProcessingStatus.MALFORMED_PAYLOAD;
      context.error = error;
      return { success: false, context, error, shouldContinue: false };
    }
  }
}
