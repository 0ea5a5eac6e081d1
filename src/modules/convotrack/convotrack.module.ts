import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
  Provider,
} from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  ConversationLifecycleEngine,
  ConversationService,
  ConversationStore,
  SignatureVerifier,
  WebhookProcessor,
  WhatsAppPayloadDecoder,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import {
  TypeORMStorageAdapter,
  createTypeORMConfig,
  ensureDatabaseDirectory,
} from '../../adapters/storage/typeorm';
import {
  ConvoTrackModuleConfig,
  ConvoTrackModuleAsyncConfig,
  mergeConfig,
} from './convotrack.config';
import {
  CONVOTRACK_CONFIG,
  CONVERSATION_STORE,
  LIFECYCLE_ENGINE,
  WEBHOOK_PROCESSOR,
  CONVERSATION_SERVICE,
} from './constants';
import { WebhookController } from './controllers/webhook.controller';
import { ConversationController } from './controllers/conversation.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';

const controllers = [WebhookController, ConversationController, HealthController];

const exportedTokens = [
  CONVOTRACK_CONFIG,
  CONVERSATION_STORE,
  LIFECYCLE_ENGINE,
  WEBHOOK_PROCESSOR,
  CONVERSATION_SERVICE,
  ConfigurationService,
];

/**
 * ConvoTrack Module - Main NestJS Module
 *
 * Provides dependency injection and configuration for ConvoTrack
 */
@Global()
@Module({})
export class ConvoTrackModule implements OnApplicationShutdown {
  private readonly logger = new Logger(ConvoTrackModule.name);

  constructor(
    @Inject(CONVERSATION_STORE)
    private readonly store: ConversationStore,
  ) {}

  /**
   * Configure ConvoTrack synchronously
   */
  static forRoot(config: ConvoTrackModuleConfig): DynamicModule {
    return {
      module: ConvoTrackModule,
      providers: [
        {
          provide: CONVOTRACK_CONFIG,
          useValue: mergeConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers,
      exports: exportedTokens,
    };
  }

  /**
   * Configure ConvoTrack asynchronously
   */
  static forRootAsync(options: ConvoTrackModuleAsyncConfig): DynamicModule {
    return {
      module: ConvoTrackModule,
      imports: options.imports || [],
      providers: [
        {
          provide: CONVOTRACK_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers,
      exports: exportedTokens,
    };
  }

  /**
   * Build and initialize the configured store
   */
  static async createStore(
    config: ConvoTrackModuleConfig,
  ): Promise<ConversationStore> {
    let store: ConversationStore;

    switch (config.storage.type) {
      case 'memory':
        store = new MockStorageAdapter();
        break;

      case 'typeorm': {
        const options = createTypeORMConfig(config.storage.options);
        ensureDatabaseDirectory(options.database);
        store = new TypeORMStorageAdapter(new DataSource(options));
        break;
      }

      case 'custom':
        if (!config.storage.store) {
          throw new Error('Custom conversation store not provided');
        }
        store = config.storage.store;
        break;

      default:
        throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
    }

    await store.initialize();
    return store;
  }

  /**
   * Providers shared by forRoot and forRootAsync; all read the config token
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: CONVERSATION_STORE,
        useFactory: (config: ConvoTrackModuleConfig) => this.createStore(config),
        inject: [CONVOTRACK_CONFIG],
      },
      {
        provide: LIFECYCLE_ENGINE,
        useFactory: (
          config: ConvoTrackModuleConfig,
          store: ConversationStore,
        ) => new ConversationLifecycleEngine(store, { hooks: config.hooks }),
        inject: [CONVOTRACK_CONFIG, CONVERSATION_STORE],
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          config: ConvoTrackModuleConfig,
          store: ConversationStore,
          engine: ConversationLifecycleEngine,
        ) =>
          new WebhookProcessor({
            store,
            engine,
            verifier: new SignatureVerifier(config.whatsapp.appSecret),
            decoder: new WhatsAppPayloadDecoder(),
            hooks: config.hooks,
            timeoutMs: config.webhooks?.timeoutMs,
          }),
        inject: [CONVOTRACK_CONFIG, CONVERSATION_STORE, LIFECYCLE_ENGINE],
      },
      {
        provide: CONVERSATION_SERVICE,
        useFactory: (
          store: ConversationStore,
          engine: ConversationLifecycleEngine,
        ) => new ConversationService(store, engine),
        inject: [CONVERSATION_STORE, LIFECYCLE_ENGINE],
      },
      ConfigurationService,
    ];
  }

  async onApplicationShutdown(): Promise<void> {
    this.logger.log('Closing conversation store');
    await this.store.close();
  }
}
