import { Module } from '@nestjs/common';

// Shared services (existing infrastructure)
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';
import { HttpModule } from '../shared/http/http.module';
import { JobPoolModule } from '../job-pool/job-pool.module';
import { JobPoolService } from '../job-pool/job-pool.service';

// Injection tokens (string symbols for DI)
import {
  CATALOG_ACTIONS_PORT,
  CATALOG_SOURCE_PORT,
  DOWNLOADER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_POOL_PORT,
  JOB_REPOSITORY_PORT,
} from '../application/ports/output/injection-tokens';

// Adapters (implementations)
import { DynamoDbJobRepositoryAdapter } from './adapters/persistence/dynamodb-job-repository.adapter';
import { BilibiliCatalogAdapter } from './adapters/catalog/bilibili-catalog.adapter';
import { YuttoDownloaderAdapter } from './adapters/downloader/yutto-downloader.adapter';
import { LogEventPublisherAdapter } from './adapters/events/log-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (DynamoDB, HTTP, job pool)
 * 2. Creates adapters that implement ports
 * 3. Exports the port tokens so they can be injected into use cases
 */
@Module({
  imports: [DynamoDbModule, HttpModule, JobPoolModule],
  providers: [
    // Persistence adapters
    {
      provide: JOB_REPOSITORY_PORT,
      useClass: DynamoDbJobRepositoryAdapter,
    },

    // Catalog adapter: one client serves both the read and the write port
    BilibiliCatalogAdapter,
    {
      provide: CATALOG_SOURCE_PORT,
      useExisting: BilibiliCatalogAdapter,
    },
    {
      provide: CATALOG_ACTIONS_PORT,
      useExisting: BilibiliCatalogAdapter,
    },

    // Downloader adapter
    {
      provide: DOWNLOADER_PORT,
      useClass: YuttoDownloaderAdapter,
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LogEventPublisherAdapter,
    },

    // Job pool
    {
      provide: JOB_POOL_PORT,
      useExisting: JobPoolService,
    },
  ],
  exports: [
    JOB_REPOSITORY_PORT,
    CATALOG_SOURCE_PORT,
    CATALOG_ACTIONS_PORT,
    DOWNLOADER_PORT,
    EVENT_PUBLISHER_PORT,
    JOB_POOL_PORT,
  ],
})
export class InfrastructureModule {}
