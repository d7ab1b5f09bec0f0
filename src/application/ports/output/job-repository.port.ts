import { JobEntity } from '../../../domain/entities/job.entity';
import { JobPayload } from '../../../domain/value-objects/job-payload.vo';
import { JobStatus, StatusChange } from '../../../domain/value-objects/job-status.vo';

export type JobStats = Record<JobStatus, number>;

export interface PaginateQuery {
  page: number;
  pageSize: number;
  status?: JobStatus;
}

export interface JobPage {
  items: JobEntity[];
  total: number;
  page: number;
  pageSize: number;
}

/**
 * Job Repository Port (Driven Port)
 * Durable job table keyed by the canonical task key
 */
export interface JobRepositoryPort {
  /**
   * Insert a new PENDING job.
   * Throws DuplicateTaskKeyError when the key already exists; uniqueness is
   * enforced by the write itself, never by a prior read.
   */
  create(payload: JobPayload): Promise<JobEntity>;

  findByKey(taskKey: string): Promise<JobEntity | null>;

  findById(id: string): Promise<JobEntity | null>;

  /**
   * Unconditional status write with completedAt/errorMessage bookkeeping.
   * Returns null when the key does not exist.
   */
  updateStatus(taskKey: string, change: StatusChange): Promise<JobEntity | null>;

  /**
   * Compare-and-set status write. Applies only when the current status is
   * `from`; returns null otherwise. Entering EXECUTING counts an attempt.
   * Throws InvalidStatusChangeError for a move outside the automatic lifecycle.
   */
  transition(taskKey: string, from: JobStatus, change: StatusChange): Promise<JobEntity | null>;

  /**
   * Overwrite the payload. With resetToPending the job goes back to PENDING
   * with error, completion time and attempts cleared.
   */
  updatePayload(
    taskKey: string,
    payload: JobPayload,
    resetToPending: boolean,
  ): Promise<JobEntity | null>;

  /**
   * PENDING jobs, oldest first
   */
  listPending(limit?: number): Promise<JobEntity[]>;

  /**
   * Jobs in one status, oldest first
   */
  listByStatus(status: JobStatus): Promise<JobEntity[]>;

  stats(): Promise<JobStats>;

  /**
   * Newest first. Pages are 1-based.
   */
  paginate(query: PaginateQuery): Promise<JobPage>;

  delete(taskKey: string): Promise<boolean>;

  healthCheck(): Promise<boolean>;
}
