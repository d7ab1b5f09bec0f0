import { describe, it, expect, beforeEach } from 'vitest';
import { QueryCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDbJobRepositoryAdapter } from '../../../src/infrastructure/adapters/persistence/dynamodb-job-repository.adapter';
import { DuplicateTaskKeyError } from '../../../src/domain/errors/job.errors';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { TaskType } from '../../../src/domain/value-objects/job-payload.vo';
import {
  conditionalCheckFailure,
  createFakeDynamoDb,
  createJobRecord,
} from '../helpers/dynamodb-fakes';

describe('DynamoDbJobRepositoryAdapter', () => {
  let fake: ReturnType<typeof createFakeDynamoDb>;
  let repository: DynamoDbJobRepositoryAdapter;

  const payload = { kind: TaskType.MEDIA_DOWNLOAD, itemId: 'BV1', collectionId: 'fav1' } as const;

  beforeEach(() => {
    fake = createFakeDynamoDb();
    repository = new DynamoDbJobRepositoryAdapter(fake.service);
  });

  describe('create', () => {
    it('should store a fresh PENDING job under its canonical key', async () => {
      fake.docSend.mockResolvedValueOnce({});

      const job = await repository.create(payload);

      expect(job.status).toBe(JobStatus.PENDING);
      expect(job.taskKey).toBe('{"collectionId":"fav1","itemId":"BV1"}');
      expect(fake.docSend.mock.calls[0][0].input.Item.taskKey).toBe(job.taskKey);
    });

    it('should raise DuplicateTaskKeyError when the key exists', async () => {
      fake.docSend.mockRejectedValueOnce(conditionalCheckFailure());

      await expect(repository.create(payload)).rejects.toBeInstanceOf(DuplicateTaskKeyError);
    });
  });

  describe('transition', () => {
    it('should count the attempt when claiming', async () => {
      fake.docSend.mockResolvedValueOnce({
        Attributes: createJobRecord({ status: JobStatus.EXECUTING, attempts: 1 }),
      });

      const job = await repository.transition('k', JobStatus.PENDING, { status: JobStatus.EXECUTING });

      const input = fake.docSend.mock.calls[0][0].input;
      expect(input.UpdateExpression).toContain('#attempts = if_not_exists(#attempts, :zero) + :one');
      expect(input.ExpressionAttributeValues[':expectedStatus']).toBe(JobStatus.PENDING);
      expect(job?.attempts).toBe(1);
    });

    it('should return null when another worker won the race', async () => {
      fake.docSend.mockRejectedValueOnce(conditionalCheckFailure());

      await expect(
        repository.transition('k', JobStatus.PENDING, { status: JobStatus.EXECUTING }),
      ).resolves.toBeNull();
    });

    it('should record the error message when failing', async () => {
      fake.docSend.mockResolvedValueOnce({
        Attributes: createJobRecord({ status: JobStatus.FAILED, errorMessage: 'boom' }),
      });

      await repository.transition('k', JobStatus.EXECUTING, {
        status: JobStatus.FAILED,
        errorMessage: 'boom',
      });

      const input = fake.docSend.mock.calls[0][0].input;
      expect(input.ExpressionAttributeValues[':errorMessage']).toBe('boom');
      expect(input.UpdateExpression).toMatch(/REMOVE #completedAt$/);
      expect(input.UpdateExpression).not.toContain('#attempts');
    });

    it('should refuse to complete a job that is not executing', async () => {
      await expect(
        repository.transition('k', JobStatus.PENDING, { status: JobStatus.COMPLETED }),
      ).rejects.toThrow('Transition PENDING -> COMPLETED is not an automatic transition');
      expect(fake.docSend).not.toHaveBeenCalled();
    });
  });

  describe('updatePayload', () => {
    it('should reset status and attempts when asked', async () => {
      fake.docSend.mockResolvedValueOnce({ Attributes: createJobRecord() });

      await repository.updatePayload('k', { ...payload, selectedParts: [1, 2] }, true);

      const input = fake.docSend.mock.calls[0][0].input;
      expect(input.ExpressionAttributeValues[':status']).toBe(JobStatus.PENDING);
      expect(input.ExpressionAttributeValues[':payload'].selectedParts).toEqual([1, 2]);
      expect(input.UpdateExpression).toContain('#attempts = :zero');
    });

    it('should leave status alone otherwise', async () => {
      fake.docSend.mockResolvedValueOnce({ Attributes: createJobRecord() });

      await repository.updatePayload('k', payload, false);

      const input = fake.docSend.mock.calls[0][0].input;
      expect(input.ExpressionAttributeNames['#status']).toBeUndefined();
      expect(input.UpdateExpression).not.toContain('REMOVE');
    });
  });

  describe('listPending', () => {
    it('should fail undecodable pending rows and return the rest', async () => {
      fake.docSend
        .mockResolvedValueOnce({
          Items: [createJobRecord(), { taskKey: 'broken', status: JobStatus.PENDING, payload: {} }],
        })
        .mockResolvedValueOnce({});

      const jobs = await repository.listPending(5);

      expect(jobs.map((job) => job.payload.itemId)).toEqual(['BV1']);
      const failUpdate = fake.docSend.mock.calls[1][0].input;
      expect(failUpdate.Key).toEqual({ taskKey: 'broken' });
      expect(failUpdate.ExpressionAttributeValues[':errorMessage']).toMatch(/^Invalid payload: /);
    });
  });

  it('should count every status', async () => {
    fake.docSend.mockImplementation(async (command: unknown) => {
      if (command instanceof QueryCommand) {
        const status = command.input.ExpressionAttributeValues?.[':status'];
        return { Count: status === JobStatus.PENDING ? 2 : status === JobStatus.FAILED ? 1 : 0 };
      }
      return {};
    });

    await expect(repository.stats()).resolves.toEqual({
      PENDING: 2,
      EXECUTING: 0,
      COMPLETED: 0,
      FAILED: 1,
    });
  });

  describe('paginate', () => {
    it('should return the requested window newest first', async () => {
      const records = ['A', 'B', 'C', 'D'].map((itemId, index) =>
        createJobRecord({ itemId, createdAt: `2025-01-0${index + 1}T00:00:00.000Z` }),
      );
      fake.docSend.mockImplementation(async (command: unknown) => {
        if (!(command instanceof QueryCommand)) return {};
        if (command.input.Select === 'COUNT') {
          return { Count: command.input.ExpressionAttributeValues?.[':status'] === JobStatus.PENDING ? 5 : 0 };
        }
        return { Items: records };
      });

      const page = await repository.paginate({ page: 2, pageSize: 2 });

      expect(page.items.map((job) => job.payload.itemId)).toEqual(['B', 'A']);
      expect(page.total).toBe(5);
      expect(page.page).toBe(2);
    });

    it('should filter by status through the status index', async () => {
      fake.docSend
        .mockResolvedValueOnce({ Items: [createJobRecord({ status: JobStatus.FAILED })] })
        .mockResolvedValueOnce({ Count: 1 });

      const page = await repository.paginate({ page: 1, pageSize: 10, status: JobStatus.FAILED });

      expect(fake.docSend.mock.calls[0][0].input.IndexName).toBe('status-index');
      expect(fake.docSend.mock.calls[0][0].input.ScanIndexForward).toBe(false);
      expect(page.total).toBe(1);
      expect(page.items).toHaveLength(1);
    });
  });

  it('should report an unreachable table as unhealthy', async () => {
    fake.clientSend.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    await expect(repository.healthCheck()).resolves.toBe(false);
  });
});
