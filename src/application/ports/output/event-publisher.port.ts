import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Outbound port for job lifecycle events (`job.created`, `job.completed`,
 * `job.failed`, `job.retried`).
 */
export interface EventPublisherPort {
  publish(event: DomainEvent): Promise<void>;

  /** Fire and forget; a failed publish is logged, never thrown to the caller */
  publishAsync(event: DomainEvent): void;
}
