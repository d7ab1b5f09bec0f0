import { Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { ConsumerService } from '../../processing/services/consumer.service';
import { ProducerService } from '../../processing/services/producer.service';
import { ReconciliationService } from '../../processing/services/reconciliation.service';

@Injectable()
export class ProcessingLoopsHealthIndicator extends HealthIndicator {
  constructor(
    private readonly producer: ProducerService,
    private readonly consumer: ConsumerService,
    private readonly reconciliation: ReconciliationService,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const details = {
      producer: this.producer.running,
      consumer: this.consumer.running,
      reconciliation: this.reconciliation.running,
      inFlightJobs: this.consumer.inFlightCount,
    };

    if (details.producer && details.consumer) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'Processing loops are not running',
      this.getStatus(key, false, details),
    );
  }
}
