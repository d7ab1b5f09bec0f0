import { Inject, Injectable } from '@nestjs/common';
import { QueryJobsPort } from '../ports/input/query-jobs.port';
import {
  JobPage,
  JobRepositoryPort,
  JobStats,
  PaginateQuery,
} from '../ports/output/job-repository.port';
import { JOB_REPOSITORY_PORT } from '../ports/output/injection-tokens';
import { JobEntity } from '../../domain/entities/job.entity';
import { JobNotFoundError } from '../../domain/errors/job.errors';

@Injectable()
export class QueryJobsUseCase implements QueryJobsPort {
  constructor(@Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort) {}

  stats(): Promise<JobStats> {
    return this.jobRepository.stats();
  }

  list(query: PaginateQuery): Promise<JobPage> {
    return this.jobRepository.paginate(query);
  }

  async getById(jobId: string): Promise<JobEntity> {
    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }
}
