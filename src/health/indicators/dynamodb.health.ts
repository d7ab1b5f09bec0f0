import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { JobRepositoryPort } from '../../application/ports/output/job-repository.port';
import { JOB_REPOSITORY_PORT } from '../../application/ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';

@Injectable()
export class DynamoDbHealthIndicator extends HealthIndicator {
  private readonly tableName: string;

  constructor(
    @Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    super();
    this.tableName = this.configService.get('dynamodb', { infer: true }).tableName;
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const details = { tableName: this.tableName };

    if (await this.jobRepository.healthCheck()) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'DynamoDB job table is not available',
      this.getStatus(key, false, details),
    );
  }
}
