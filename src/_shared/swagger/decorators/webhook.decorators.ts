import { applyDecorators } from '@nestjs/common';
import {
  ApiOperation,
  ApiResponse,
  ApiBody,
  ApiHeader,
  ApiQuery,
} from '@nestjs/swagger';
import { WebhookResponseDto } from '../../dto';

/**
 * Swagger decorator for the subscription handshake
 */
export const ApiWebhookVerification = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Webhook subscription handshake',
      description:
        'Echoes hub.challenge when hub.mode is subscribe and hub.verify_token matches the configured verify token.',
    }),
    ApiQuery({ name: 'hub.mode', required: false, example: 'subscribe' }),
    ApiQuery({ name: 'hub.verify_token', required: false }),
    ApiQuery({ name: 'hub.challenge', required: false, example: '1158201444' }),
    ApiResponse({
      status: 200,
      description: 'Challenge echoed as plain text',
      schema: { type: 'string', example: '1158201444' },
    }),
    ApiResponse({ status: 403, description: 'Verification refused' }),
  );
};

/**
 * Swagger decorator for the webhook delivery endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive WhatsApp webhook',
      description:
        'Verifies the signature, decodes inbound messages and applies one conversation transition per message. Answers 200 once the signature passes, whatever happens during processing.',
    }),
    ApiHeader({
      name: 'x-hub-signature-256',
      description: 'sha256=<hex HMAC-SHA256 of the raw body keyed by the app secret>',
      required: true,
    }),
    ApiBody({
      description: 'WhatsApp Business webhook payload',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          object: 'whatsapp_business_account',
          entry: [
            {
              id: '102290129340398',
              changes: [
                {
                  field: 'messages',
                  value: {
                    messaging_product: 'whatsapp',
                    contacts: [
                      { wa_id: '5511999999999', profile: { name: 'Maria' } },
                    ],
                    messages: [
                      {
                        from: '5511999999999',
                        id: 'wamid.example',
                        timestamp: '1700000000',
                        type: 'text',
                        text: { body: 'Hello' },
                      },
                    ],
                  },
                },
              ],
            },
          ],
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Delivery accepted',
      type: WebhookResponseDto,
    }),
    ApiResponse({ status: 403, description: 'Signature verification failed' }),
    ApiResponse({ status: 500, description: 'App secret is not configured' }),
  );
};
