import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { ConversationStore, LifecycleHooks } from '../../core';
import type { SqliteDataSourceOptions } from '../../adapters/storage/typeorm';

/**
 * ConvoTrack Module Configuration
 */
export interface ConvoTrackModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    /** TypeORM options merged over the SQLite defaults */
    options?: Partial<SqliteDataSourceOptions>;
    store?: ConversationStore;
  };

  /**
   * WhatsApp Business credentials
   */
  whatsapp: {
    /**
     * Key of the X-Hub-Signature-256 HMAC. Deliveries are refused with a
     * server error while it is unset.
     */
    appSecret?: string;

    /**
     * Token expected in the subscription handshake. The handshake always
     * fails while it is unset.
     */
    verifyToken?: string;
  };

  /**
   * Webhook processing configuration
   */
  webhooks?: {
    timeoutMs?: number;
  };

  /**
   * Lifecycle hooks
   */
  hooks?: LifecycleHooks;

  /**
   * Include processing ids and statuses in webhook responses
   */
  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface ConvoTrackModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    Promise<ConvoTrackModuleConfig> | ConvoTrackModuleConfig
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultConvoTrackConfig = {
  webhooks: {
    timeoutMs: 10000,
  },
  debug: false,
} satisfies Partial<ConvoTrackModuleConfig>;

export function mergeConfig(
  config: ConvoTrackModuleConfig,
): ConvoTrackModuleConfig {
  return {
    ...defaultConvoTrackConfig,
    ...config,
    webhooks: { ...defaultConvoTrackConfig.webhooks, ...config.webhooks },
  };
}
