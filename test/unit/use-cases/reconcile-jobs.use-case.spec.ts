import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReconcileJobsUseCase } from '../../../src/application/use-cases/reconcile-jobs.use-case';
import { JobFailedEvent } from '../../../src/domain/events/job-failed.event';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import {
  InMemoryCatalogAdapter,
  InMemoryEventPublisherAdapter,
  InMemoryJobPoolAdapter,
  InMemoryJobRepositoryAdapter,
} from '../../in-memory-adapters';
import {
  createTestCollections,
  createTestConfig,
  createTestConfigService,
  createTestJob,
} from '../helpers/mock-factories';

describe('ReconcileJobsUseCase', () => {
  let repository: InMemoryJobRepositoryAdapter;
  let catalog: InMemoryCatalogAdapter;
  let pool: InMemoryJobPoolAdapter;
  let publisher: InMemoryEventPublisherAdapter;

  const now = new Date('2025-01-01T01:00:00.000Z');

  const buildUseCase = (env: Record<string, string> = {}) =>
    new ReconcileJobsUseCase(
      repository,
      catalog,
      pool,
      publisher,
      createTestConfigService(
        createTestConfig({
          env: { TASK_TIMEOUT_SECONDS: '60', RECONCILE_STUCK_GRACE_SECONDS: '30', ...env },
          collections: createTestCollections({ collections: { fav1: 'a', fav2: 'b' } }),
        }),
      ),
    );

  const seed = (itemId: string, collectionId: string, status: JobStatus, updatedAt?: string) =>
    repository.seed(
      createTestJob({
        id: `id-${itemId}`,
        itemId,
        collectionId,
        status,
        ...(updatedAt && { updatedAt }),
      }),
    );

  beforeEach(() => {
    repository = new InMemoryJobRepositoryAdapter();
    catalog = new InMemoryCatalogAdapter();
    pool = new InMemoryJobPoolAdapter();
    publisher = new InMemoryEventPublisherAdapter();
  });

  describe('stuck executing jobs', () => {
    it('should fail untracked jobs idle past timeout plus grace', async () => {
      seed('OLD', 'fav1', JobStatus.EXECUTING, '2025-01-01T00:58:00.000Z');
      seed('FRESH', 'fav1', JobStatus.EXECUTING, '2025-01-01T00:59:00.000Z');
      seed('RUNNING', 'fav1', JobStatus.EXECUTING, '2025-01-01T00:00:00.000Z');
      pool.track(repository.getAll()[2].taskKey);

      const result = await buildUseCase().execute(now);

      expect(result.failedStuckJobs).toBe(1);
      const statuses = Object.fromEntries(
        repository.getAll().map((job) => [job.payload.itemId, job.status]),
      );
      expect(statuses).toEqual({
        OLD: JobStatus.FAILED,
        FRESH: JobStatus.EXECUTING,
        RUNNING: JobStatus.EXECUTING,
      });
      expect(repository.getAll()[0].errorMessage).toBe(
        'Execution lost: no result recorded within 90s',
      );

      const failed = publisher
        .getPublishedEvents()
        .filter((event): event is JobFailedEvent => event instanceof JobFailedEvent);
      expect(failed.map((event) => event.payload.failureReason)).toEqual(['execution_lost']);
    });

    it('should do nothing when the rule is disabled', async () => {
      seed('OLD', 'fav1', JobStatus.EXECUTING, '2025-01-01T00:00:00.000Z');

      const result = await buildUseCase({ RECONCILE_FAIL_STUCK_EXECUTING: 'false' }).execute(now);

      expect(result.failedStuckJobs).toBe(0);
      expect(repository.getAll()[0].status).toBe(JobStatus.EXECUTING);
    });
  });

  describe('orphaned pending jobs', () => {
    beforeEach(() => {
      seed('LISTED', 'fav1', JobStatus.PENDING);
      seed('REMOVED', 'fav1', JobStatus.PENDING);
      seed('SUBMITTED', '-1', JobStatus.PENDING);
      seed('UNCONFIGURED', 'gone', JobStatus.PENDING);
      seed('UNLISTABLE', 'fav2', JobStatus.PENDING);
      catalog.setCollection('fav1', ['LISTED']);
      catalog.failCollection('fav2');
    });

    it('should delete only jobs whose item left a fully listed collection', async () => {
      const result = await buildUseCase({ RECONCILE_PRUNE_ORPHANED_PENDING: 'true' }).execute(now);

      expect(result.prunedPendingJobs).toBe(1);
      expect(repository.getAll().map((job) => job.payload.itemId)).toEqual([
        'LISTED',
        'SUBMITTED',
        'UNCONFIGURED',
        'UNLISTABLE',
      ]);
    });

    it('should keep everything when pruning is off', async () => {
      const result = await buildUseCase().execute(now);

      expect(result.prunedPendingJobs).toBe(0);
      expect(repository.getAll()).toHaveLength(5);
    });
  });

  it('should count completed jobs per configured collection', async () => {
    seed('P', 'fav1', JobStatus.COMPLETED);
    seed('Q', 'fav1', JobStatus.COMPLETED);
    seed('R', '-1', JobStatus.COMPLETED);
    seed('S', 'fav2', JobStatus.PENDING);

    const result = await buildUseCase().execute(now);

    expect(result.completedByCollection).toEqual({ fav1: 2, fav2: 0, '-1': 1 });
  });

  it('should keep running later rules when one fails', async () => {
    seed('P', 'fav1', JobStatus.COMPLETED);
    vi.spyOn(repository, 'listByStatus').mockRejectedValueOnce(new Error('table unavailable'));

    const result = await buildUseCase().execute(now);

    expect(result.failedStuckJobs).toBe(0);
    expect(result.completedByCollection).toEqual({ fav1: 1, fav2: 0, '-1': 0 });
  });
});
