import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ConvoTrackModule } from './modules';
import { EnvironmentVariables, validateEnvironment } from './config/env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    ConvoTrackModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => ({
        storage:
          config.get('STORAGE_TYPE', { infer: true }) === 'memory'
            ? { type: 'memory' }
            : {
                type: 'typeorm',
                options: {
                  database: config.get('DB_PATH', { infer: true }),
                  timeout: config.get('DB_BUSY_TIMEOUT_MS', { infer: true }),
                  logging: config.get('DB_LOGGING', { infer: true }),
                },
              },
        whatsapp: {
          appSecret: config.get('WHATSAPP_APP_SECRET', { infer: true }),
          verifyToken: config.get('WHATSAPP_VERIFY_TOKEN', { infer: true }),
        },
        webhooks: {
          timeoutMs: config.get('WEBHOOK_TIMEOUT_MS', { infer: true }),
        },
        debug: config.get('DEBUG', { infer: true }),
      }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
