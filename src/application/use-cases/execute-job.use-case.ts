import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir } from 'fs/promises';
import { ExecuteJobPort, ExecuteJobResult } from '../ports/input/execute-job.port';
import { JobRepositoryPort } from '../ports/output/job-repository.port';
import { CatalogSourcePort } from '../ports/output/catalog-source.port';
import { CatalogActionsPort } from '../ports/output/catalog-actions.port';
import { DownloaderPort } from '../ports/output/downloader.port';
import { JobPoolPort } from '../ports/output/job-pool.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  CATALOG_ACTIONS_PORT,
  CATALOG_SOURCE_PORT,
  DOWNLOADER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_POOL_PORT,
  JOB_REPOSITORY_PORT,
} from '../ports/output/injection-tokens';
import { DownloadPathResolver } from '../services/download-path.resolver';
import { AppConfig } from '../../config/configuration';
import { CollectionConfig, DEFAULT_API_COLLECTION_PATH } from '../../config/collections.schema';
import { JobEntity } from '../../domain/entities/job.entity';
import {
  ExecutionCancelledError,
  ItemUnavailableError,
  JobTimeoutError,
} from '../../domain/errors/job.errors';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import { JobFailedEvent } from '../../domain/events/job-failed.event';
import { MediaDownloadPayload, TaskType, assertNever } from '../../domain/value-objects/job-payload.vo';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { PostprocessAction, describeAction } from '../../domain/value-objects/postprocess-action.vo';
import { API_COLLECTION_ID } from '../../domain/value-objects/task-key.vo';

interface JobOutput {
  destination: string;
}

interface ResolvedCollection {
  config: CollectionConfig;
  /** False when the job's collection is unknown and the API entry stands in */
  configured: boolean;
}

/**
 * Execute Job Use Case
 *
 * Runs one claimed job inside a job pool permit: resolve the destination,
 * download, then apply the collection's postprocess actions. The whole run is
 * bounded by the task timeout; the job always ends COMPLETED or FAILED, except
 * when shutdown cancels it, in which case it goes back to PENDING.
 *
 * Outcomes are compare-and-set writes from EXECUTING: a job moved elsewhere
 * while it ran (an override, a reconcile sweep) keeps that newer status.
 */
@Injectable()
export class ExecuteJobUseCase implements ExecuteJobPort {
  private readonly logger = new Logger(ExecuteJobUseCase.name);
  private readonly taskTimeoutMs: number;
  private readonly collections: Map<string, CollectionConfig>;
  private readonly apiCollection: CollectionConfig;

  constructor(
    @Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort,
    @Inject(CATALOG_SOURCE_PORT) private readonly catalogSource: CatalogSourcePort,
    @Inject(CATALOG_ACTIONS_PORT) private readonly catalogActions: CatalogActionsPort,
    @Inject(DOWNLOADER_PORT) private readonly downloader: DownloaderPort,
    @Inject(JOB_POOL_PORT) private readonly jobPool: JobPoolPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly pathResolver: DownloadPathResolver,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    this.taskTimeoutMs = this.configService.get('sync', { infer: true }).taskTimeoutSeconds * 1000;
    this.collections = new Map(
      this.configService
        .get('collections', { infer: true })
        .map((collection) => [collection.id, collection]),
    );
    this.apiCollection = this.collections.get(API_COLLECTION_ID) ?? {
      id: API_COLLECTION_ID,
      path: DEFAULT_API_COLLECTION_PATH,
      postprocess: [],
    };
  }

  async execute(job: JobEntity): Promise<ExecuteJobResult> {
    const label = JobEntity.label(job);
    const startedAt = Date.now();

    try {
      const output = await this.jobPool.run(
        { key: job.taskKey, label, timeoutMs: this.taskTimeoutMs },
        (signal) => this.runJob(job, signal),
      );

      const completed = await this.jobRepository.transition(job.taskKey, JobStatus.EXECUTING, {
        status: JobStatus.COMPLETED,
      });
      if (!completed) {
        return this.superseded(job, label, 'completed');
      }
      const durationMs = Date.now() - startedAt;
      this.logger.log(`Job ${label} completed in ${durationMs}ms`);

      this.eventPublisher.publishAsync(
        new JobCompletedEvent({
          jobId: job.id,
          taskKey: job.taskKey,
          destination: output.destination,
          durationMs,
        }),
      );
      return { outcome: 'completed', job: completed };
    } catch (error) {
      if (error instanceof ExecutionCancelledError) {
        this.logger.warn(`Job ${label} cancelled by shutdown, returning it to PENDING`);
        const requeued = await this.jobRepository.transition(job.taskKey, JobStatus.EXECUTING, {
          status: JobStatus.PENDING,
        });
        return { outcome: 'requeued', job: requeued };
      }

      return this.fail(job, label, error);
    }
  }

  private async fail(job: JobEntity, label: string, error: unknown): Promise<ExecuteJobResult> {
    const timedOut = error instanceof JobTimeoutError;
    const detail = error instanceof Error ? error.message : String(error);
    const errorMessage = timedOut ? detail : `Error processing job ${label}: ${detail}`;

    this.logger.error(errorMessage, error instanceof Error ? error.stack : undefined);

    const failed = await this.jobRepository.transition(job.taskKey, JobStatus.EXECUTING, {
      status: JobStatus.FAILED,
      errorMessage,
    });
    if (!failed) {
      return this.superseded(job, label, 'failed');
    }

    this.eventPublisher.publishAsync(
      new JobFailedEvent({
        jobId: job.id,
        taskKey: job.taskKey,
        errorMessage,
        failureReason: timedOut ? 'timeout' : 'execution_error',
        attempts: job.attempts,
      }),
    );
    return { outcome: 'failed', job: failed };
  }

  private async superseded(
    job: JobEntity,
    label: string,
    result: 'completed' | 'failed',
  ): Promise<ExecuteJobResult> {
    const current = await this.jobRepository.findByKey(job.taskKey);
    this.logger.warn(
      `Job ${label} ${result}, but it is no longer EXECUTING (now ${current?.status ?? 'deleted'}); outcome discarded`,
    );
    return { outcome: 'superseded', job: current };
  }

  private resolveCollection(collectionId: string): ResolvedCollection {
    const config = this.collections.get(collectionId);
    if (config) {
      return { config, configured: true };
    }
    this.logger.warn(`Collection ${collectionId} is not configured, using the API collection`);
    return { config: this.apiCollection, configured: false };
  }

  private runJob(job: JobEntity, signal: AbortSignal): Promise<JobOutput> {
    switch (job.payload.kind) {
      case TaskType.MEDIA_DOWNLOAD:
        return this.runMediaDownload(job.payload, signal);
      default:
        return assertNever(job.payload.kind);
    }
  }

  private async runMediaDownload(
    payload: MediaDownloadPayload,
    signal: AbortSignal,
  ): Promise<JobOutput> {
    const { config: collection, configured } = this.resolveCollection(payload.collectionId);

    const destination = this.pathResolver.resolve(collection.path);
    await mkdir(destination, { recursive: true });

    const info = await this.catalogSource.getItemInfo(payload.itemId);
    if (!info) {
      throw new ItemUnavailableError(payload.itemId);
    }

    const selectedParts = payload.selectedParts;
    await this.downloader.download({
      itemId: payload.itemId,
      destination,
      batch: info.parts > 1 || (selectedParts !== undefined && selectedParts.length > 0),
      selectedParts,
      nameTemplate: payload.nameTemplate ?? collection.name,
      signal,
    });

    // Postprocess acts on the job's own collection; a stand-in entry has none to act on
    const postprocess = configured ? collection.postprocess : [];
    for (const action of postprocess) {
      signal.throwIfAborted();
      await this.applyPostprocess(action, info.aid, payload.collectionId);
    }

    return { destination };
  }

  private async applyPostprocess(
    action: PostprocessAction,
    aid: number,
    collectionId: string,
  ): Promise<void> {
    this.logger.debug(`Postprocess ${describeAction(action)} for av${aid}`);
    switch (action.action) {
      case 'move':
        await this.catalogActions.moveItem(aid, collectionId, action.targetCollectionId);
        return;
      case 'remove':
        await this.catalogActions.removeItem(aid, collectionId);
        return;
      default:
        assertNever(action);
    }
  }
}
