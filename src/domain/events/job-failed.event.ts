import { DomainEvent } from './base.event';

export interface JobFailedEventPayload {
  jobId: string;
  taskKey: string;
  errorMessage: string;
  failureReason: 'execution_error' | 'timeout' | 'execution_lost';
  attempts: number;
}

export class JobFailedEvent extends DomainEvent {
  constructor(public readonly payload: JobFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.failed';
  }

  get subject(): string {
    return this.payload.taskKey;
  }

  get failureReason(): string {
    return this.payload.failureReason;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
