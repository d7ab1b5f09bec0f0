import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ReconcileJobsPort, ReconcileJobsResult } from '../ports/input/reconcile-jobs.port';
import { JobRepositoryPort } from '../ports/output/job-repository.port';
import { CatalogSourcePort } from '../ports/output/catalog-source.port';
import { JobPoolPort } from '../ports/output/job-pool.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  CATALOG_SOURCE_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_POOL_PORT,
  JOB_REPOSITORY_PORT,
} from '../ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { CollectionConfig } from '../../config/collections.schema';
import { JobEntity } from '../../domain/entities/job.entity';
import { JobFailedEvent } from '../../domain/events/job-failed.event';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { isCatalogCollection } from '../../domain/value-objects/task-key.vo';

/**
 * Reconcile Jobs Use Case
 *
 * Rules, each independent of the others:
 * - stuck executing: EXECUTING rows this process is not running and that have
 *   not been touched for taskTimeout + grace are failed
 * - orphaned pending (opt-in): PENDING rows whose item left its collection
 *   are deleted; API submissions are never pruned
 * - audit: COMPLETED rows counted per collection
 */
@Injectable()
export class ReconcileJobsUseCase implements ReconcileJobsPort {
  private readonly logger = new Logger(ReconcileJobsUseCase.name);
  private readonly settings: AppConfig['reconcile'];
  private readonly taskTimeoutSeconds: number;
  private readonly collections: CollectionConfig[];

  constructor(
    @Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort,
    @Inject(CATALOG_SOURCE_PORT) private readonly catalogSource: CatalogSourcePort,
    @Inject(JOB_POOL_PORT) private readonly jobPool: JobPoolPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    this.settings = this.configService.get('reconcile', { infer: true });
    this.taskTimeoutSeconds = this.configService.get('sync', { infer: true }).taskTimeoutSeconds;
    this.collections = this.configService.get('collections', { infer: true });
  }

  async execute(now: Date = new Date()): Promise<ReconcileJobsResult> {
    const result: ReconcileJobsResult = {
      failedStuckJobs: 0,
      prunedPendingJobs: 0,
      completedByCollection: {},
    };

    if (this.settings.failStuckExecuting) {
      result.failedStuckJobs = await this.runRule('stuck executing', 0, () =>
        this.failStuckExecuting(now),
      );
    }

    if (this.settings.pruneOrphanedPending) {
      result.prunedPendingJobs = await this.runRule('orphaned pending', 0, () =>
        this.pruneOrphanedPending(),
      );
    }

    result.completedByCollection = await this.runRule('audit', {}, () => this.auditCompleted());

    this.logger.log(
      `Reconciliation finished: ${result.failedStuckJobs} stuck job(s) failed, ` +
        `${result.prunedPendingJobs} orphaned job(s) pruned, completed per collection ` +
        JSON.stringify(result.completedByCollection),
    );
    return result;
  }

  private async runRule<T>(name: string, fallback: T, rule: () => Promise<T>): Promise<T> {
    try {
      return await rule();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Reconciliation rule "${name}" failed: ${reason}`);
      return fallback;
    }
  }

  private async failStuckExecuting(now: Date): Promise<number> {
    const thresholdSeconds = this.taskTimeoutSeconds + this.settings.stuckGraceSeconds;
    const errorMessage = `Execution lost: no result recorded within ${thresholdSeconds}s`;
    const executing = await this.jobRepository.listByStatus(JobStatus.EXECUTING);

    let failed = 0;
    for (const job of executing) {
      if (this.jobPool.isTracked(job.taskKey)) {
        continue;
      }
      const idleMs = now.getTime() - new Date(job.updatedAt).getTime();
      if (idleMs < thresholdSeconds * 1000) {
        continue;
      }

      const updated = await this.jobRepository.transition(job.taskKey, JobStatus.EXECUTING, {
        status: JobStatus.FAILED,
        errorMessage,
      });
      if (!updated) {
        continue;
      }

      failed++;
      this.logger.warn(`Job ${JobEntity.label(job)} was stuck in EXECUTING, marked FAILED`);
      this.eventPublisher.publishAsync(
        new JobFailedEvent({
          jobId: job.id,
          taskKey: job.taskKey,
          errorMessage,
          failureReason: 'execution_lost',
          attempts: job.attempts,
        }),
      );
    }
    return failed;
  }

  private async pruneOrphanedPending(): Promise<number> {
    const pending = await this.jobRepository.listByStatus(JobStatus.PENDING);
    const configured = new Set(this.collections.map((collection) => collection.id));

    const byCollection = new Map<string, JobEntity[]>();
    for (const job of pending) {
      const collectionId = job.payload.collectionId;
      if (!isCatalogCollection(collectionId) || !configured.has(collectionId)) {
        continue;
      }
      byCollection.set(collectionId, [...(byCollection.get(collectionId) ?? []), job]);
    }

    let pruned = 0;
    for (const [collectionId, jobs] of byCollection) {
      const listed = await this.listCollection(collectionId);
      if (!listed) {
        continue;
      }
      for (const job of jobs) {
        if (listed.has(job.payload.itemId)) {
          continue;
        }
        if (await this.jobRepository.delete(job.taskKey)) {
          pruned++;
          this.logger.log(`Pruned job ${JobEntity.label(job)}: item left its collection`);
        }
      }
    }
    return pruned;
  }

  /**
   * Null when the listing failed; an orphan is only decided on a full listing.
   */
  private async listCollection(collectionId: string): Promise<Set<string> | null> {
    const ids = new Set<string>();
    try {
      for await (const itemId of this.catalogSource.listItemIds(collectionId)) {
        ids.add(itemId);
      }
      return ids;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Skipping orphan check for collection ${collectionId}: ${reason}`);
      return null;
    }
  }

  private async auditCompleted(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const collection of this.collections) {
      counts[collection.id] = 0;
    }

    const completed = await this.jobRepository.listByStatus(JobStatus.COMPLETED);
    for (const job of completed) {
      const collectionId = job.payload.collectionId;
      counts[collectionId] = (counts[collectionId] ?? 0) + 1;
    }
    return counts;
  }
}
