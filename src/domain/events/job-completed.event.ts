import { DomainEvent } from './base.event';

/**
 * Job Completed Event
 * Emitted when download and postprocess finished within the timeout
 */
export interface JobCompletedEventPayload {
  jobId: string;
  taskKey: string;
  destination: string;
  durationMs: number;
}

export class JobCompletedEvent extends DomainEvent {
  constructor(public readonly payload: JobCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.completed';
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
