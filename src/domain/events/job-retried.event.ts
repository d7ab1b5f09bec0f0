import { DomainEvent } from './base.event';

/**
 * Job Retried Event
 * Emitted when a FAILED job is reopened to PENDING
 */
export interface JobRetriedEventPayload {
  jobId: string;
  taskKey: string;
  attempts: number;
  previousError?: string;
  trigger: 'producer' | 'api';
}

export class JobRetriedEvent extends DomainEvent {
  constructor(public readonly payload: JobRetriedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.retried';
  }

  get subject(): string {
    return this.payload.taskKey;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
