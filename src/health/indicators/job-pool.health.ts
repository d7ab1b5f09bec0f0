import { Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { JobPoolService } from '../../job-pool/job-pool.service';

@Injectable()
export class JobPoolHealthIndicator extends HealthIndicator {
  constructor(private readonly jobPool: JobPoolService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const stats = this.jobPool.getStats();

    const details = {
      maxConcurrent: stats.maxConcurrent,
      activeJobs: stats.activeJobs,
      queuedJobs: stats.queuedJobs,
      completedJobs: stats.completedJobs,
      failedJobs: stats.failedJobs,
      timedOutJobs: stats.timedOutJobs,
      averageProcessingTimeMs: Math.round(stats.averageProcessingTimeMs),
    };

    if (this.jobPool.isAcceptingWork()) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'Job pool is shutting down',
      this.getStatus(key, false, details),
    );
  }
}
