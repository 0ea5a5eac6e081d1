import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, { rawBody: true });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('ConvoTrack')
    .setDescription(
      'Tracks WhatsApp Business conversations from verified webhook deliveries and keeps running new, open and closed counts.',
    )
    .setVersion('0.1.0')
    .addTag('Webhook', 'Subscription handshake and message deliveries')
    .addTag('Conversations', 'Counters, statuses and administrative operations')
    .addTag('Health', 'Liveness, readiness and statistics')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = app.get(ConfigService).get<number>('PORT') ?? 5000;
  await app.listen(port);

  logger.log(`ConvoTrack is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start ConvoTrack',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
