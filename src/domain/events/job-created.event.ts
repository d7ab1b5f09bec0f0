import { DomainEvent } from './base.event';

/**
 * Job Created Event
 * Emitted when a job is admitted by the producer or the API
 */
export interface JobCreatedEventPayload {
  jobId: string;
  taskKey: string;
  taskType: string;
  source: 'catalog' | 'api';
}

export class JobCreatedEvent extends DomainEvent {
  constructor(public readonly payload: JobCreatedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.created';
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
