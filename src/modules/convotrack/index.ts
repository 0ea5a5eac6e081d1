/**
 * ConvoTrack NestJS Module
 *
 * Main module for integrating ConvoTrack into NestJS applications
 */

// Main module
export { ConvoTrackModule } from './convotrack.module';

// Configuration
export type {
  ConvoTrackModuleConfig,
  ConvoTrackModuleAsyncConfig,
} from './convotrack.config';
export { defaultConvoTrackConfig, mergeConfig } from './convotrack.config';
export * from './constants';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';

// Interceptors
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';
