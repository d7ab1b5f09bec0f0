import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AdmitDiscoveredItemCommand,
  AdmitDiscoveredItemPort,
  AdmitDiscoveredItemResult,
} from '../ports/input/admit-discovered-item.port';
import { JobRepositoryPort } from '../ports/output/job-repository.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT, JOB_REPOSITORY_PORT } from '../ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { JobEntity } from '../../domain/entities/job.entity';
import { DuplicateTaskKeyError } from '../../domain/errors/job.errors';
import { JobCreatedEvent } from '../../domain/events/job-created.event';
import { JobRetriedEvent } from '../../domain/events/job-retried.event';
import { MediaDownloadPayload, TaskType, naturalKeyOf } from '../../domain/value-objects/job-payload.vo';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { RetryPolicy, hasAttemptsLeft } from '../../domain/value-objects/retry-policy.vo';
import { TaskKeyVO } from '../../domain/value-objects/task-key.vo';

/**
 * Admit Discovered Item Use Case
 * Absent -> create. FAILED -> back to PENDING once the retry policy allows it.
 * Anything else is left alone.
 */
@Injectable()
export class AdmitDiscoveredItemUseCase implements AdmitDiscoveredItemPort {
  private readonly logger = new Logger(AdmitDiscoveredItemUseCase.name);
  private readonly retryPolicy: RetryPolicy;

  constructor(
    @Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    this.retryPolicy = this.configService.get('retry', { infer: true });
  }

  async execute(command: AdmitDiscoveredItemCommand): Promise<AdmitDiscoveredItemResult> {
    const payload: MediaDownloadPayload = {
      kind: TaskType.MEDIA_DOWNLOAD,
      itemId: command.itemId,
      collectionId: command.collectionId,
    };
    const taskKey = TaskKeyVO.fromNaturalKey(naturalKeyOf(payload)).value;

    const existing = await this.jobRepository.findByKey(taskKey);
    if (!existing) {
      return this.create(payload);
    }

    if (existing.status !== JobStatus.FAILED) {
      return { outcome: 'skipped', job: existing };
    }

    if (!hasAttemptsLeft(this.retryPolicy, existing.attempts)) {
      this.logger.debug(
        `Retries exhausted for ${JobEntity.label(existing)} after ${existing.attempts} attempts`,
      );
      return { outcome: 'retries_exhausted', job: existing };
    }

    if (!JobEntity.isRetryDue(existing, this.retryPolicy)) {
      return { outcome: 'retry_deferred', job: existing };
    }

    const reopened = await this.jobRepository.transition(taskKey, JobStatus.FAILED, {
      status: JobStatus.PENDING,
    });
    if (!reopened) {
      // Someone else moved it first
      return { outcome: 'skipped', job: existing };
    }

    this.logger.log(`Retrying job ${JobEntity.label(existing)} (attempt ${existing.attempts + 1})`);
    this.eventPublisher.publishAsync(
      new JobRetriedEvent({
        jobId: reopened.id,
        taskKey,
        attempts: existing.attempts,
        previousError: existing.errorMessage,
        trigger: 'producer',
      }),
    );

    return { outcome: 'retried', job: reopened };
  }

  private async create(payload: MediaDownloadPayload): Promise<AdmitDiscoveredItemResult> {
    try {
      const job = await this.jobRepository.create(payload);
      this.eventPublisher.publishAsync(
        new JobCreatedEvent({
          jobId: job.id,
          taskKey: job.taskKey,
          taskType: job.taskType,
          source: 'catalog',
        }),
      );
      return { outcome: 'created', job };
    } catch (error) {
      if (error instanceof DuplicateTaskKeyError) {
        return { outcome: 'already_exists', job: null };
      }
      throw error;
    }
  }
}
