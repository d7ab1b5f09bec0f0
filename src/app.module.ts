import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { JobPoolModule } from './job-pool/job-pool.module';
import { ProcessingModule } from './processing/processing.module';
import { ApiModule } from './api/api.module';
import { HealthModule } from './health/health.module';

/**
 * Application Module
 * Catalog sync service: producer, consumer and reconciliation loops over a
 * DynamoDB job table, plus the HTTP API and health endpoints.
 */
@Module({
  imports: [ConfigModule, SharedModule, JobPoolModule, ProcessingModule, ApiModule, HealthModule],
})
export class AppModule {}
