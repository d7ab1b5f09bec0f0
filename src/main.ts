import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the sync service: HTTP API on Fastify plus the background loops,
 * which start once the application has bootstrapped.
 */
async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    bufferLogs: true,
  });

  // Get services
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const logger = await app.resolve(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  // Get configuration
  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const port = configService.get('port', { infer: true });
  const sync = configService.get('sync', { infer: true });
  const collections = configService.get('collections', { infer: true });

  // Shutdown runs the lifecycle hooks: loops stop, the pool drains, then the table client closes
  let shuttingDown = false;
  const shutdownHandler = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal, stopping loops and draining jobs...');
    await app.close();
    logger.info('Application shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdownHandler('SIGTERM').catch((error: unknown) => {
      logger.error({ error: String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdownHandler('SIGINT').catch((error: unknown) => {
      logger.error({ error: String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: String(reason) }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen(port, '0.0.0.0');

  // Log startup
  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      port,
      maxConcurrentTasks: sync.maxConcurrentTasks,
      syncIntervalSeconds: sync.intervalSeconds,
      collections: collections.map((collection) => collection.id),
    },
    'Sync service started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start sync service:', error);
  process.exit(1);
});
