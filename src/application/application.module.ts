import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { DownloadPathResolver } from './services/download-path.resolver';

// Use Cases
import {
  SubmitJobUseCase,
  AdmitDiscoveredItemUseCase,
  ExecuteJobUseCase,
  OverrideJobStatusUseCase,
  QueryJobsUseCase,
  ReconcileJobsUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) through injection tokens; the
 * implementations (adapters) are bound by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    DownloadPathResolver,

    // Use Cases
    SubmitJobUseCase,
    AdmitDiscoveredItemUseCase,
    ExecuteJobUseCase,
    OverrideJobStatusUseCase,
    QueryJobsUseCase,
    ReconcileJobsUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (controllers, loops)
    SubmitJobUseCase,
    AdmitDiscoveredItemUseCase,
    ExecuteJobUseCase,
    OverrideJobStatusUseCase,
    QueryJobsUseCase,
    ReconcileJobsUseCase,
  ],
})
export class ApplicationModule {}
