import { JobEntity } from '../../../domain/entities/job.entity';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface OverrideJobStatusCommand {
  jobId: string;
  status: JobStatus;
  errorMessage?: string;
}

/**
 * Override Job Status Port (Driving Port / Use Case Interface)
 * Administrative status write; any status to any status
 */
export interface OverrideJobStatusPort {
  /**
   * Throws JobNotFoundError for an unknown id and InvalidStatusChangeError
   * for FAILED without a message, in both cases before any write.
   */
  execute(command: OverrideJobStatusCommand): Promise<JobEntity>;
}
