import { Inject, Injectable, Logger } from '@nestjs/common';
import { SubmitJobCommand, SubmitJobPort, SubmitJobResult } from '../ports/input/submit-job.port';
import { JobRepositoryPort } from '../ports/output/job-repository.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT, JOB_REPOSITORY_PORT } from '../ports/output/injection-tokens';
import { JobEntity } from '../../domain/entities/job.entity';
import { DuplicateTaskKeyError } from '../../domain/errors/job.errors';
import { JobCreatedEvent } from '../../domain/events/job-created.event';
import { JobRetriedEvent } from '../../domain/events/job-retried.event';
import { MediaDownloadPayload, TaskType, naturalKeyOf } from '../../domain/value-objects/job-payload.vo';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { API_COLLECTION_ID, TaskKeyVO } from '../../domain/value-objects/task-key.vo';

/**
 * Submit Job Use Case
 * A new key is created PENDING. An existing key gets the new payload; a
 * finished job (COMPLETED or FAILED) is also put back to PENDING.
 */
@Injectable()
export class SubmitJobUseCase implements SubmitJobPort {
  private readonly logger = new Logger(SubmitJobUseCase.name);

  constructor(
    @Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: SubmitJobCommand): Promise<SubmitJobResult> {
    const payload: MediaDownloadPayload = {
      kind: TaskType.MEDIA_DOWNLOAD,
      itemId: command.itemId,
      collectionId: command.collectionId ?? API_COLLECTION_ID,
      ...(command.selectedParts &&
        command.selectedParts.length > 0 && { selectedParts: command.selectedParts }),
      ...(command.nameTemplate && { nameTemplate: command.nameTemplate }),
    };

    try {
      const job = await this.jobRepository.create(payload);
      await this.eventPublisher.publish(
        new JobCreatedEvent({
          jobId: job.id,
          taskKey: job.taskKey,
          taskType: job.taskType,
          source: 'api',
        }),
      );
      return { outcome: 'created', job, message: `Task ${payload.itemId} added to queue` };
    } catch (error) {
      if (!(error instanceof DuplicateTaskKeyError)) {
        throw error;
      }
    }

    const taskKey = TaskKeyVO.fromNaturalKey(naturalKeyOf(payload)).value;
    const existing = await this.jobRepository.findByKey(taskKey);
    if (!existing) {
      throw new Error(`Job for ${taskKey} disappeared during submission`);
    }

    const resetToPending = JobEntity.statusOf(existing).isTerminal();
    const updated = await this.jobRepository.updatePayload(taskKey, payload, resetToPending);
    if (!updated) {
      throw new Error(`Job for ${taskKey} disappeared during submission`);
    }

    if (resetToPending) {
      this.logger.log(`Resubmitted ${existing.status} job ${existing.id}, back to PENDING`);
      if (existing.status === JobStatus.FAILED) {
        this.eventPublisher.publishAsync(
          new JobRetriedEvent({
            jobId: updated.id,
            taskKey,
            attempts: existing.attempts,
            previousError: existing.errorMessage,
            trigger: 'api',
          }),
        );
      }
    }

    return {
      outcome: 'updated',
      job: updated,
      message: resetToPending
        ? `Task ${payload.itemId} updated and requeued`
        : `Task ${payload.itemId} updated`,
    };
  }
}
