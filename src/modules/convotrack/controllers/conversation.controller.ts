import {
  Controller,
  Get,
  Post,
  Param,
  Header,
  HttpCode,
  HttpStatus,
  NotFoundException,
  InternalServerErrorException,
  Inject,
  Logger,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  ConversationService,
  CounterName,
  StorageError,
  TransitionOutcome,
  toOrderedJson,
} from '../../../core';
import {
  ApiCloseConversation,
  ApiGetCounts,
  ApiGetStatus,
  ApiListStatuses,
  ApiRecalculateCounters,
} from '../../../_shared/swagger/decorators';
import {
  CloseResponseDto,
  ConversationStatusDto,
  CountsResponseDto,
  RecalculateResponseDto,
  SenderIdParamDto,
} from '../../../_shared/dto';
import { CONVERSATION_SERVICE } from '../constants';

/**
 * Conversation Controller
 * Counters, listings and administrative operations
 */
@ApiTags('Conversations')
@Controller()
export class ConversationController {
  private readonly logger = new Logger(ConversationController.name);

  constructor(
    @Inject(CONVERSATION_SERVICE)
    private readonly conversationService: ConversationService,
  ) {}

  @Get('count')
  @ApiGetCounts()
  async getCounts(): Promise<CountsResponseDto> {
    const counts = await this.withStorage('getCounts', () =>
      this.conversationService.getCounts(),
    );

    return {
      new_conversation_count: counts[CounterName.NEW_CONVERSATIONS],
      open_conversation_count: counts[CounterName.OPEN_CONVERSATIONS],
      closed_conversation_count: counts[CounterName.CLOSED_CONVERSATIONS],
    };
  }

  /**
   * Serialized here: sender ids are digit strings and a plain object
   * would reorder them
   */
  @Get('status')
  @Header('Content-Type', 'application/json')
  @ApiListStatuses()
  async listStatuses(): Promise<string> {
    const statuses = await this.withStorage('listStatuses', () =>
      this.conversationService.listStatuses(),
    );
    return toOrderedJson(statuses);
  }

  @Get('status/:senderId')
  @ApiGetStatus()
  async getStatus(
    @Param() params: SenderIdParamDto,
  ): Promise<ConversationStatusDto> {
    const status = await this.withStorage('getStatus', () =>
      this.conversationService.getStatus(params.senderId),
    );

    if (!status) {
      throw new NotFoundException({ status: TransitionOutcome.NOT_FOUND });
    }

    return status;
  }

  @Post('close/:senderId')
  @HttpCode(HttpStatus.OK)
  @ApiCloseConversation()
  async closeConversation(
    @Param() params: SenderIdParamDto,
  ): Promise<CloseResponseDto> {
    const outcome = await this.withStorage('closeConversation', () =>
      this.conversationService.closeConversation(params.senderId),
    );

    if (outcome === TransitionOutcome.NOT_FOUND) {
      this.logger.warn(`Close requested for unknown sender ${params.senderId}`);
      throw new NotFoundException({ status: outcome });
    }

    this.logger.log(`Conversation ${params.senderId}: ${outcome}`);
    return { status: outcome };
  }

  @Post('recalculate-counters')
  @HttpCode(HttpStatus.OK)
  @ApiRecalculateCounters()
  async recalculateCounters(): Promise<RecalculateResponseDto> {
    const result = await this.withStorage('recalculateCounters', () =>
      this.conversationService.recalculateCounters(),
    );

    this.logger.log(
      `Counters recalculated: open=${result.open} closed=${result.closed} new=${result.new}`,
    );

    return {
      success: true,
      open_conversation_count: result.open,
      closed_conversation_count: result.closed,
      new_conversation_count: result.new,
    };
  }

  /**
   * Report storage failures as 500 with a JSON error body
   */
  private async withStorage<T>(
    operation: string,
    work: () => Promise<T>,
  ): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (!(error instanceof StorageError)) {
        throw error;
      }

      this.logger.error(`${operation} failed: ${error.message}`, error.cause?.stack);
      throw new InternalServerErrorException({
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'storage_error',
        message: error.message,
      });
    }
  }
}
