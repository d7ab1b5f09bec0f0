import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  OverrideJobStatusCommand,
  OverrideJobStatusPort,
} from '../ports/input/override-job-status.port';
import { JobRepositoryPort } from '../ports/output/job-repository.port';
import { JOB_REPOSITORY_PORT } from '../ports/output/injection-tokens';
import { JobEntity } from '../../domain/entities/job.entity';
import { JobNotFoundError } from '../../domain/errors/job.errors';
import { toStatusChange } from '../../domain/value-objects/job-status.vo';

/**
 * Override Job Status Use Case
 * Bypasses the lifecycle rules but keeps the completedAt / errorMessage
 * bookkeeping.
 */
@Injectable()
export class OverrideJobStatusUseCase implements OverrideJobStatusPort {
  private readonly logger = new Logger(OverrideJobStatusUseCase.name);

  constructor(@Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort) {}

  async execute(command: OverrideJobStatusCommand): Promise<JobEntity> {
    const change = toStatusChange(command.status, command.errorMessage);

    const job = await this.jobRepository.findById(command.jobId);
    if (!job) {
      throw new JobNotFoundError(command.jobId);
    }

    const updated = await this.jobRepository.updateStatus(job.taskKey, change);
    if (!updated) {
      throw new JobNotFoundError(command.jobId);
    }

    this.logger.log(
      `Job ${JobEntity.label(job)} status overridden: ${job.status} -> ${updated.status}`,
    );
    return updated;
  }
}
