import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Response DTO for webhook processing
 */
export class WebhookResponseDto {
  @ApiProperty({
    description:
      'Whether every message in the delivery was applied. False still means the delivery was accepted.',
    example: true,
  })
  success!: boolean;

  @ApiPropertyOptional({
    description: 'Processing id, present in debug mode',
    example: '3f8c5e2a-7a41-4e0c-9a64-1b7c2f9e0d11',
  })
  processingId?: string;

  @ApiPropertyOptional({
    description: 'Processing status, present in debug mode',
    example: 'processed',
  })
  processingStatus?: string;
}
