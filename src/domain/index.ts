/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no framework dependencies.
 */

// Entities
export { JobEntity, type StatusFields } from './entities/job.entity';

// Value Objects
export {
  JobStatusVO,
  JobStatus,
  ALL_JOB_STATUSES,
  isJobStatus,
  toStatusChange,
  type StatusChange,
} from './value-objects/job-status.vo';
export { TaskKeyVO, API_COLLECTION_ID, type NaturalKey } from './value-objects/task-key.vo';
export {
  TaskType,
  naturalKeyOf,
  describePayload,
  assertNever,
  type JobPayload,
  type MediaDownloadPayload,
} from './value-objects/job-payload.vo';
export { describeAction, type PostprocessAction } from './value-objects/postprocess-action.vo';
export {
  computeBackoffMs,
  hasAttemptsLeft,
  type RetryPolicy,
} from './value-objects/retry-policy.vo';

// Errors
export {
  DuplicateTaskKeyError,
  JobTimeoutError,
  ItemUnavailableError,
  ExecutionCancelledError,
  JobNotFoundError,
  InvalidStatusChangeError,
} from './errors/job.errors';

// Events
export * from './events';
