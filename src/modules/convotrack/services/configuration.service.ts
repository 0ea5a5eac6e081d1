import { Injectable, Inject } from '@nestjs/common';
import type { ConvoTrackModuleConfig } from '../convotrack.config';
import { CONVOTRACK_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to ConvoTrack configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(CONVOTRACK_CONFIG)
    private readonly config: ConvoTrackModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): ConvoTrackModuleConfig {
    return this.config;
  }

  getVerifyToken(): string | undefined {
    return this.config.whatsapp.verifyToken || undefined;
  }

  isSignatureSecretConfigured(): boolean {
    return Boolean(this.config.whatsapp.appSecret);
  }

  getStorageType(): ConvoTrackModuleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug === true;
  }
}
