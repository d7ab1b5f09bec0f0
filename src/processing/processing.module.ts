import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { CatalogScannerService } from './services/catalog-scanner.service';
import { ProducerService } from './services/producer.service';
import { ConsumerService } from './services/consumer.service';
import { ReconciliationService } from './services/reconciliation.service';

@Module({
  imports: [ApplicationModule, InfrastructureModule],
  providers: [CatalogScannerService, ProducerService, ConsumerService, ReconciliationService],
  exports: [ProducerService, ConsumerService, ReconciliationService],
})
export class ProcessingModule {}
