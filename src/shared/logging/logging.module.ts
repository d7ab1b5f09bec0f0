import { Global, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { CorrelationIdMiddleware } from './correlation-id.middleware';
import { PINO_ROOT_LOGGER, PinoLoggerService, createRootLogger } from './pino-logger.service';

@Global()
@Module({
  providers: [
    {
      provide: PINO_ROOT_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        createRootLogger({
          logLevel: configService.get('logLevel', { infer: true }),
          nodeEnv: configService.get('nodeEnv', { infer: true }),
        }),
    },
    PinoLoggerService,
  ],
  exports: [PINO_ROOT_LOGGER, PinoLoggerService],
})
export class LoggingModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
