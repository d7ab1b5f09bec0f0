import { Injectable, Logger } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Log Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log line
 */
@Injectable()
export class LogEventPublisherAdapter implements EventPublisherPort {
  private readonly logger = new Logger(LogEventPublisherAdapter.name);

  async publish(event: DomainEvent): Promise<void> {
    this.logger.log(`[EVENT] ${event.eventName} ${event.subject} ${JSON.stringify(event.toJSON())}`);
  }

  publishAsync(event: DomainEvent): void {
    this.publish(event).catch((error: unknown) => {
      this.logger.error(
        `Failed to publish event ${event.eventName}`,
        error instanceof Error ? error.stack : String(error),
      );
    });
  }
}
