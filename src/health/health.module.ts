import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { DynamoDbHealthIndicator } from './indicators/dynamodb.health';
import { JobPoolHealthIndicator } from './indicators/job-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { ProcessingLoopsHealthIndicator } from './indicators/processing-loops.health';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { JobPoolModule } from '../job-pool/job-pool.module';
import { ProcessingModule } from '../processing/processing.module';

@Module({
  imports: [TerminusModule, InfrastructureModule, JobPoolModule, ProcessingModule],
  controllers: [HealthController],
  providers: [
    DynamoDbHealthIndicator,
    JobPoolHealthIndicator,
    DiskSpaceHealthIndicator,
    ProcessingLoopsHealthIndicator,
  ],
})
export class HealthModule {}
