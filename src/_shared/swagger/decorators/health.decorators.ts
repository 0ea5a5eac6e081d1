import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { ALL_COUNTERS } from '../../../core/domain/enums';

export const ApiHealthCheck = () =>
  applyDecorators(
    ApiOperation({ summary: 'Liveness check' }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Seconds' },
        },
      },
    }),
  );

const number = { type: 'number' } as const;

const pipelineSchema = {
  type: 'object',
  properties: {
    stages: {
      type: 'array',
      items: { type: 'string' },
      example: ['verification', 'decoding', 'lifecycle'],
    },
    timeoutMs: { type: 'number', example: 10000 },
  },
};

export const ApiReadinessCheck = () =>
  applyDecorators(
    ApiOperation({
      summary: 'Readiness check',
      description: 'Ready once the store answers and an app secret is set',
    }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['ready', 'not_ready'] },
          checks: {
            type: 'object',
            properties: {
              database: { type: 'boolean' },
              signatureSecret: { type: 'boolean' },
            },
          },
          details: {
            type: 'object',
            properties: {
              database: { type: 'string', enum: ['connected', 'disconnected'] },
              storage: { type: 'string', example: 'typeorm' },
              pipeline: pipelineSchema,
            },
          },
        },
      },
    }),
  );

/**
 * Row counts next to the live counters; they differ only after drift
 */
export const ApiServiceStatistics = () =>
  applyDecorators(
    ApiOperation({ summary: 'Store, counter and pipeline statistics' }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          storage: {
            type: 'object',
            properties: {
              conversationCount: number,
              openCount: number,
              closedCount: number,
            },
          },
          counters: {
            type: 'object',
            properties: Object.fromEntries(
              ALL_COUNTERS.map((name) => [name, number]),
            ),
          },
          pipeline: pipelineSchema,
          runtime: {
            type: 'object',
            properties: {
              uptime: number,
              node: { type: 'string', example: 'v20.11.0' },
            },
          },
        },
      },
    }),
  );
