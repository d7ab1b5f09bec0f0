import { InvalidStatusChangeError } from '../errors/job.errors';

/**
 * Job Status Value Object
 * Lifecycle status of a sync job
 */
export enum JobStatus {
  PENDING = 'PENDING',
  EXECUTING = 'EXECUTING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

export const ALL_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.PENDING,
  JobStatus.EXECUTING,
  JobStatus.COMPLETED,
  JobStatus.FAILED,
];

export function isJobStatus(value: string): value is JobStatus {
  return ALL_JOB_STATUSES.some((status) => status === value);
}

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  /**
   * Accepts both the stored form (`PENDING`) and the wire form (`pending`).
   */
  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.trim().toUpperCase();
    if (!isJobStatus(normalizedValue)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(normalizedValue);
  }

  static of(value: JobStatus): JobStatusVO {
    return new JobStatusVO(value);
  }

  static pending(): JobStatusVO {
    return new JobStatusVO(JobStatus.PENDING);
  }

  static executing(): JobStatusVO {
    return new JobStatusVO(JobStatus.EXECUTING);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  get value(): JobStatus {
    return this._value;
  }

  /**
   * Lowercase form used by the HTTP API.
   */
  get wireValue(): string {
    return this._value.toLowerCase();
  }

  isTerminal(): boolean {
    return this._value === JobStatus.COMPLETED || this._value === JobStatus.FAILED;
  }

  isActive(): boolean {
    return this._value === JobStatus.PENDING || this._value === JobStatus.EXECUTING;
  }

  /**
   * Transitions taken by the automatic flows (claim, execution, retry,
   * shutdown requeue). Administrative overrides bypass this table.
   */
  canTransitionTo(newStatus: JobStatusVO): boolean {
    const transitions: Record<JobStatus, JobStatus[]> = {
      [JobStatus.PENDING]: [JobStatus.EXECUTING],
      [JobStatus.EXECUTING]: [JobStatus.COMPLETED, JobStatus.FAILED, JobStatus.PENDING],
      [JobStatus.FAILED]: [JobStatus.PENDING],
      [JobStatus.COMPLETED]: [],
    };

    return transitions[this._value].includes(newStatus._value);
  }

  equals(other: JobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

/**
 * A requested status change. Entering FAILED always carries its cause.
 */
export type StatusChange =
  | { status: JobStatus.PENDING | JobStatus.EXECUTING | JobStatus.COMPLETED }
  | { status: JobStatus.FAILED; errorMessage: string };

/**
 * Guard for compare-and-set writes, which only ever carry automatic transitions.
 */
export function assertAutomaticTransition(from: JobStatus, to: JobStatus): void {
  if (!JobStatusVO.of(from).canTransitionTo(JobStatusVO.of(to))) {
    throw new InvalidStatusChangeError(`Transition ${from} -> ${to} is not an automatic transition`);
  }
}

export function toStatusChange(status: JobStatus, errorMessage?: string): StatusChange {
  if (status === JobStatus.FAILED) {
    if (!errorMessage) {
      throw new InvalidStatusChangeError('A FAILED status change requires an error message');
    }
    return { status, errorMessage };
  }
  return { status };
}
