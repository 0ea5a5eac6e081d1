import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

/**
 * Route parameter naming a sender
 */
export class SenderIdParamDto {
  @ApiProperty({
    description: 'Sender id (WhatsApp wa_id)',
    example: '5511999999999',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  @Matches(/^[\w.+-]+$/, {
    message: 'senderId may only contain letters, digits and . _ + -',
  })
  senderId!: string;
}

/**
 * Aggregate conversation counters
 */
export class CountsResponseDto {
  @ApiProperty({ example: 1 })
  new_conversation_count!: number;

  @ApiProperty({ example: 1 })
  open_conversation_count!: number;

  @ApiProperty({ example: 0 })
  closed_conversation_count!: number;
}

/**
 * One conversation as reported by the status endpoints
 */
export class ConversationStatusDto {
  @ApiProperty({ enum: ['open', 'closed'], example: 'open' })
  status!: string;

  @ApiProperty({ description: 'Epoch seconds', example: 1700000000 })
  creation_timestamp!: number;

  @ApiPropertyOptional({
    description: 'Epoch seconds; null while open',
    nullable: true,
    example: null,
  })
  closed_timestamp!: number | null;

  @ApiPropertyOptional({
    description: 'Epoch seconds of the latest message',
    nullable: true,
    example: 1700000000,
  })
  last_message_timestamp!: number | null;

  @ApiPropertyOptional({ nullable: true, example: 'Maria' })
  contact_name!: string | null;
}

export class CloseResponseDto {
  @ApiProperty({ enum: ['closed', 'already_closed'], example: 'closed' })
  status!: string;
}

export class RecalculateResponseDto extends CountsResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;
}
