import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type {
  ConversationStore,
  CounterSnapshot,
  StoreStatistics,
  WebhookProcessor,
} from '../../../core';
import { CONVERSATION_STORE, WEBHOOK_PROCESSOR } from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
  ApiServiceStatistics,
} from '../../../_shared/swagger/decorators';
import { ConfigurationService } from '../services/configuration.service';

export interface ReadinessReport {
  status: 'ready' | 'not_ready';
  checks: {
    database: boolean;
    signatureSecret: boolean;
  };
  details: {
    database: 'connected' | 'disconnected';
    storage: string;
    pipeline: ReturnType<WebhookProcessor['getStatistics']>;
  };
}

export interface ServiceStatistics {
  storage: StoreStatistics;
  counters: CounterSnapshot;
  pipeline: ReturnType<WebhookProcessor['getStatistics']>;
  runtime: {
    uptime: number;
    node: string;
  };
}

/**
 * Health Controller
 * Liveness, readiness and store statistics
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(CONVERSATION_STORE)
    private readonly store: ConversationStore,
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
    private readonly configurationService: ConfigurationService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<ReadinessReport> {
    const databaseHealthy = await this.store.isHealthy();
    const secretConfigured =
      this.configurationService.isSignatureSecretConfigured();

    return {
      status: databaseHealthy && secretConfigured ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
        signatureSecret: secretConfigured,
      },
      details: {
        database: databaseHealthy ? 'connected' : 'disconnected',
        storage: this.configurationService.getStorageType(),
        pipeline: this.webhookProcessor.getStatistics(),
      },
    };
  }

  /**
   * Row counts next to the live counters; a gap between them is drift that
   * recalculation repairs
   */
  @Get('stats')
  @ApiServiceStatistics()
  async statistics(): Promise<ServiceStatistics> {
    const storage = await this.store.getStatistics();
    const counters = await this.store.readCounters();

    return {
      storage,
      counters,
      pipeline: this.webhookProcessor.getStatistics(),
      runtime: {
        uptime: process.uptime(),
        node: process.version,
      },
    };
  }
}
