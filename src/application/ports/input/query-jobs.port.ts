import { JobEntity } from '../../../domain/entities/job.entity';
import { JobPage, JobStats, PaginateQuery } from '../output/job-repository.port';

/**
 * Query Jobs Port (Driving Port / Use Case Interface)
 * Read side for the HTTP API
 */
export interface QueryJobsPort {
  stats(): Promise<JobStats>;

  list(query: PaginateQuery): Promise<JobPage>;

  /**
   * Throws JobNotFoundError for an unknown id
   */
  getById(jobId: string): Promise<JobEntity>;
}
