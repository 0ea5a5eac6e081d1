import { applyDecorators } from '@nestjs/common';
import {
  ApiExtraModels,
  ApiOperation,
  ApiResponse,
  ApiParam,
  getSchemaPath,
} from '@nestjs/swagger';
import {
  CloseResponseDto,
  ConversationStatusDto,
  CountsResponseDto,
  RecalculateResponseDto,
} from '../../dto';

const senderIdParam = () =>
  ApiParam({
    name: 'senderId',
    description: 'Sender id (WhatsApp wa_id)',
    example: '5511999999999',
  });

const storageErrorResponse = () =>
  ApiResponse({
    status: 500,
    description: 'Storage failure',
    schema: {
      type: 'object',
      properties: {
        statusCode: { type: 'number', example: 500 },
        error: { type: 'string', example: 'storage_error' },
        message: { type: 'string' },
      },
    },
  });

const notFoundResponse = () =>
  ApiResponse({
    status: 404,
    description: 'No conversation for this sender',
    schema: {
      type: 'object',
      properties: { status: { type: 'string', example: 'not_found' } },
    },
  });

export const ApiGetCounts = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Conversation counters',
      description: 'Current new, open and closed conversation counters',
    }),
    ApiResponse({ status: 200, type: CountsResponseDto }),
    storageErrorResponse(),
  );
};

export const ApiListStatuses = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'All conversations',
      description:
        'Object keyed by sender id, newest creation timestamp first',
    }),
    ApiExtraModels(ConversationStatusDto),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        additionalProperties: { $ref: getSchemaPath(ConversationStatusDto) },
      },
    }),
    storageErrorResponse(),
  );
};

export const ApiGetStatus = () => {
  return applyDecorators(
    ApiOperation({ summary: 'One conversation' }),
    senderIdParam(),
    ApiResponse({ status: 200, type: ConversationStatusDto }),
    ApiResponse({ status: 400, description: 'Invalid sender id' }),
    notFoundResponse(),
    storageErrorResponse(),
  );
};

export const ApiCloseConversation = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Close a conversation',
      description:
        'Administrative close. Closing a closed conversation reports already_closed and changes nothing.',
    }),
    senderIdParam(),
    ApiResponse({ status: 200, type: CloseResponseDto }),
    ApiResponse({ status: 400, description: 'Invalid sender id' }),
    notFoundResponse(),
    storageErrorResponse(),
  );
};

export const ApiRecalculateCounters = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Recalculate counters',
      description:
        'Recounts conversations per status and overwrites the counters. The new counter is set to the open count.',
    }),
    ApiResponse({ status: 200, type: RecalculateResponseDto }),
    storageErrorResponse(),
  );
};
