import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AdmitDiscoveredItemUseCase } from '../../../src/application/use-cases/admit-discovered-item.use-case';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import {
  InMemoryEventPublisherAdapter,
  InMemoryJobRepositoryAdapter,
} from '../../in-memory-adapters';
import { createTestConfig, createTestConfigService, createTestJob } from '../helpers/mock-factories';

describe('AdmitDiscoveredItemUseCase', () => {
  let repository: InMemoryJobRepositoryAdapter;
  let publisher: InMemoryEventPublisherAdapter;
  let useCase: AdmitDiscoveredItemUseCase;

  const minutesAgo = (minutes: number) => new Date(Date.now() - minutes * 60_000).toISOString();

  const failedJob = (attempts: number, updatedAt: string) =>
    createTestJob({ status: JobStatus.FAILED, errorMessage: 'boom', attempts, updatedAt });

  beforeEach(() => {
    repository = new InMemoryJobRepositoryAdapter();
    publisher = new InMemoryEventPublisherAdapter();
    const config = createTestConfig({
      env: { RETRY_MAX_ATTEMPTS: '3', RETRY_BACKOFF_BASE_SECONDS: '60' },
    });
    useCase = new AdmitDiscoveredItemUseCase(repository, publisher, createTestConfigService(config));
  });

  it('should create a job for a new item', async () => {
    const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

    expect(result.outcome).toBe('created');
    expect(result.job?.status).toBe(JobStatus.PENDING);
    expect(publisher.getEventNames()).toEqual(['job.created']);
  });

  it('should report a create lost to a concurrent admission', async () => {
    repository.seed(createTestJob());
    vi.spyOn(repository, 'findByKey').mockResolvedValueOnce(null);

    const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

    expect(result).toEqual({ outcome: 'already_exists', job: null });
  });

  it.each([JobStatus.PENDING, JobStatus.EXECUTING, JobStatus.COMPLETED])(
    'should leave a %s job alone',
    async (status) => {
      repository.seed(createTestJob({ status }));

      const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

      expect(result.outcome).toBe('skipped');
      expect(repository.getAll()[0].status).toBe(status);
    },
  );

  it('should reopen a failed job once its backoff elapsed', async () => {
    repository.seed(failedJob(1, minutesAgo(10)));

    const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

    expect(result.outcome).toBe('retried');
    expect(result.job).toMatchObject({ status: JobStatus.PENDING, attempts: 1 });
    expect(publisher.getEventNames()).toEqual(['job.retried']);
  });

  it('should defer a failed job still inside its backoff', async () => {
    repository.seed(failedJob(2, minutesAgo(1)));

    const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

    expect(result.outcome).toBe('retry_deferred');
    expect(repository.getAll()[0].status).toBe(JobStatus.FAILED);
  });

  it('should stop retrying at the attempt cap', async () => {
    repository.seed(failedJob(3, minutesAgo(600)));

    const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

    expect(result.outcome).toBe('retries_exhausted');
    expect(publisher.getEventNames()).toEqual([]);
  });

  it('should skip when another writer moved the job first', async () => {
    repository.seed(failedJob(1, minutesAgo(10)));
    vi.spyOn(repository, 'transition').mockResolvedValueOnce(null);

    const result = await useCase.execute({ itemId: 'BV1', collectionId: 'fav1' });

    expect(result.outcome).toBe('skipped');
    expect(publisher.getEventNames()).toEqual([]);
  });
});
