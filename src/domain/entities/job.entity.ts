import { produce } from 'immer';
import { JobPayload, TaskType, describePayload, naturalKeyOf } from '../value-objects/job-payload.vo';
import { JobStatus, JobStatusVO, StatusChange } from '../value-objects/job-status.vo';
import { TaskKeyVO } from '../value-objects/task-key.vo';
import { RetryPolicy, computeBackoffMs, hasAttemptsLeft } from '../value-objects/retry-policy.vo';

/**
 * Job Entity
 * One unit of work: fetch catalog item X into the destination of collection Y.
 *
 * Plain readonly data; operations live in the namespace below and return new
 * instances produced with immer.
 */
export interface JobEntity {
  readonly id: string;
  readonly taskType: TaskType;
  readonly taskKey: string;
  readonly payload: JobPayload;
  readonly status: JobStatus;
  readonly attempts: number;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly completedAt?: string;
  readonly errorMessage?: string;
}

/**
 * Columns touched by a status change. `undefined` means the column is cleared.
 */
export interface StatusFields {
  status: JobStatus;
  updatedAt: string;
  completedAt: string | undefined;
  errorMessage: string | undefined;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace JobEntity {
  export interface CreateProps {
    id: string;
    payload: JobPayload;
    now?: Date;
  }

  export function create(props: CreateProps): JobEntity {
    const timestamp = (props.now ?? new Date()).toISOString();
    return {
      id: props.id,
      taskType: props.payload.kind,
      taskKey: TaskKeyVO.fromNaturalKey(naturalKeyOf(props.payload)).value,
      payload: props.payload,
      status: JobStatus.PENDING,
      attempts: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  /**
   * Single source of the completedAt / errorMessage bookkeeping:
   * completedAt is set iff COMPLETED, errorMessage iff FAILED.
   */
  export function statusFields(change: StatusChange, now: Date = new Date()): StatusFields {
    const timestamp = now.toISOString();
    switch (change.status) {
      case JobStatus.COMPLETED:
        return {
          status: change.status,
          updatedAt: timestamp,
          completedAt: timestamp,
          errorMessage: undefined,
        };
      case JobStatus.FAILED:
        return {
          status: change.status,
          updatedAt: timestamp,
          completedAt: undefined,
          errorMessage: change.errorMessage,
        };
      default:
        return {
          status: change.status,
          updatedAt: timestamp,
          completedAt: undefined,
          errorMessage: undefined,
        };
    }
  }

  export function applyStatusChange(
    job: JobEntity,
    change: StatusChange,
    now: Date = new Date(),
  ): JobEntity {
    const fields = statusFields(change, now);
    return produce(job, (draft) => {
      draft.status = fields.status;
      draft.updatedAt = fields.updatedAt;
      draft.completedAt = fields.completedAt;
      draft.errorMessage = fields.errorMessage;
    });
  }

  /**
   * PENDING -> EXECUTING, counting the attempt.
   */
  export function claim(job: JobEntity, now: Date = new Date()): JobEntity {
    return produce(applyStatusChange(job, { status: JobStatus.EXECUTING }, now), (draft) => {
      draft.attempts = job.attempts + 1;
    });
  }

  export function withPayload(
    job: JobEntity,
    payload: JobPayload,
    resetToPending: boolean,
    now: Date = new Date(),
  ): JobEntity {
    const base = resetToPending
      ? applyStatusChange(job, { status: JobStatus.PENDING }, now)
      : job;
    return produce(base, (draft) => {
      draft.payload = payload;
      draft.updatedAt = now.toISOString();
      if (resetToPending) {
        draft.attempts = 0;
      }
    });
  }

  export function statusOf(job: JobEntity): JobStatusVO {
    return JobStatusVO.of(job.status);
  }

  /**
   * Whether the producer may reopen this FAILED job now.
   */
  export function isRetryDue(job: JobEntity, policy: RetryPolicy, now: Date = new Date()): boolean {
    if (job.status !== JobStatus.FAILED || !hasAttemptsLeft(policy, job.attempts)) {
      return false;
    }
    const elapsed = now.getTime() - new Date(job.updatedAt).getTime();
    return elapsed >= computeBackoffMs(policy, job.attempts);
  }

  export function label(job: JobEntity): string {
    return describePayload(job.payload);
  }
}
