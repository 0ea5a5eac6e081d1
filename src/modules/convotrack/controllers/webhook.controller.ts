import {
  Controller,
  Get,
  Post,
  Body,
  Query,
  Header,
  Headers,
  HttpCode,
  HttpStatus,
  ForbiddenException,
  InternalServerErrorException,
  UseInterceptors,
  Inject,
  Logger,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import {
  ConversationService,
  IncomingHeaders,
  ProcessingResult,
  ProcessingStatus,
  WebhookProcessor,
} from '../../../core';
import {
  ApiWebhookEndpoint,
  ApiWebhookVerification,
} from '../../../_shared/swagger/decorators';
import { WebhookResponseDto } from '../../../_shared/dto';
import { CONVERSATION_SERVICE, WEBHOOK_PROCESSOR } from '../constants';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Webhook Controller
 *
 * Subscription handshake and delivery endpoint for the WhatsApp Business
 * platform. Once the signature passes, deliveries are always answered 200 so
 * the platform does not retry on internal failures.
 */
@ApiTags('Webhook')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
    @Inject(CONVERSATION_SERVICE)
    private readonly conversationService: ConversationService,
    private readonly configurationService: ConfigurationService,
  ) {}

  @Get()
  @Header('Content-Type', 'text/plain')
  @ApiWebhookVerification()
  verifySubscription(
    @Query('hub.mode') mode?: string,
    @Query('hub.verify_token') token?: string,
    @Query('hub.challenge') challenge?: string,
  ): string {
    const echo = this.conversationService.verifySubscription(
      mode,
      token,
      challenge,
      this.configurationService.getVerifyToken(),
    );

    if (echo === null) {
      this.logger.warn(`Subscription verification refused (mode: ${mode ?? 'none'})`);
      throw new ForbiddenException('Verification failed');
    }

    this.logger.log('Webhook subscription verified');
    return echo;
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint()
  async handleWebhook(
    @Body() rawBody: Buffer,
    @Headers() headers: IncomingHeaders,
  ): Promise<WebhookResponseDto> {
    const body = Buffer.isBuffer(rawBody) ? rawBody : Buffer.alloc(0);
    const result = await this.webhookProcessor.processWebhook(body, headers);

    switch (result.processingStatus) {
      case ProcessingStatus.SIGNATURE_FAILED:
        this.logger.warn(
          `[${result.processingId}] Signature rejected: ${result.error?.message}`,
        );
        throw new ForbiddenException('Invalid signature');

      case ProcessingStatus.CONFIGURATION_ERROR:
        this.logger.error(
          `[${result.processingId}] ${result.error?.message ?? 'Configuration error'}`,
        );
        throw new InternalServerErrorException('Server configuration error');

      default:
        if (!result.success) {
          this.logger.warn(
            `[${result.processingId}] Webhook processing ${result.processingStatus}: ${result.error?.message}`,
          );
        }
        return this.formatResponse(result);
    }
  }

  private formatResponse(result: ProcessingResult): WebhookResponseDto {
    if (!this.configurationService.isDebugMode()) {
      return { success: result.success };
    }

    return {
      success: result.success,
      processingId: result.processingId,
      processingStatus: result.processingStatus,
    };
  }
}
