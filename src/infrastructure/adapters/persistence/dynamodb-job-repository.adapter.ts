import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  JobPage,
  JobRepositoryPort,
  JobStats,
  PaginateQuery,
} from '../../../application/ports/output/job-repository.port';
import { JobEntity } from '../../../domain/entities/job.entity';
import { DuplicateTaskKeyError } from '../../../domain/errors/job.errors';
import { JobPayload, TaskType } from '../../../domain/value-objects/job-payload.vo';
import {
  ALL_JOB_STATUSES,
  JobStatus,
  StatusChange,
  assertAutomaticTransition,
} from '../../../domain/value-objects/job-status.vo';
import {
  DynamoDbService,
  JobRecordUpdate,
  isConditionalCheckFailure,
} from '../../../shared/aws/dynamodb/dynamodb.service';
import { JobRecord } from '../../../shared/aws/dynamodb/job-record.schema';

/**
 * DynamoDB Job Repository Adapter
 * Implements JobRepositoryPort on a table keyed by taskKey
 */
@Injectable()
export class DynamoDbJobRepositoryAdapter implements JobRepositoryPort {
  private readonly logger = new Logger(DynamoDbJobRepositoryAdapter.name);

  constructor(private readonly dynamoDb: DynamoDbService) {}

  async create(payload: JobPayload): Promise<JobEntity> {
    const job = JobEntity.create({ id: uuidv4(), payload });

    try {
      await this.dynamoDb.putJob(this.toRecord(job));
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new DuplicateTaskKeyError(job.taskKey);
      }
      throw error;
    }

    this.logger.log(`Created job ${job.id} for ${job.taskKey}`);
    return job;
  }

  async findByKey(taskKey: string): Promise<JobEntity | null> {
    const record = await this.dynamoDb.getJob(taskKey);
    return record ? this.toDomainEntity(record) : null;
  }

  async findById(id: string): Promise<JobEntity | null> {
    const record = await this.dynamoDb.findJobById(id);
    return record ? this.toDomainEntity(record) : null;
  }

  async updateStatus(taskKey: string, change: StatusChange): Promise<JobEntity | null> {
    const record = await this.dynamoDb.updateJob(taskKey, this.statusUpdate(change));
    return record ? this.toDomainEntity(record) : null;
  }

  async transition(
    taskKey: string,
    from: JobStatus,
    change: StatusChange,
  ): Promise<JobEntity | null> {
    assertAutomaticTransition(from, change.status);
    const record = await this.dynamoDb.updateJob(taskKey, {
      ...this.statusUpdate(change),
      expectedStatus: from,
      incrementAttempts: change.status === JobStatus.EXECUTING,
    });
    return record ? this.toDomainEntity(record) : null;
  }

  async updatePayload(
    taskKey: string,
    payload: JobPayload,
    resetToPending: boolean,
  ): Promise<JobEntity | null> {
    const update: JobRecordUpdate = resetToPending
      ? { ...this.statusUpdate({ status: JobStatus.PENDING }), resetAttempts: true }
      : { set: { updatedAt: new Date().toISOString() } };
    update.set.payload = this.toRecordPayload(payload);

    const record = await this.dynamoDb.updateJob(taskKey, update);
    return record ? this.toDomainEntity(record) : null;
  }

  /**
   * Pending rows that cannot be decoded are failed here so they stop being
   * offered to the consumer.
   */
  async listPending(limit?: number): Promise<JobEntity[]> {
    const malformed: Array<{ taskKey: string; issues: string }> = [];
    const records = await this.dynamoDb.queryByStatus(JobStatus.PENDING, {
      ascending: true,
      limit,
      onMalformed: (taskKey, issues) => malformed.push({ taskKey, issues }),
    });

    for (const { taskKey, issues } of malformed) {
      if (await this.dynamoDb.failMalformedJob(taskKey, `Invalid payload: ${issues}`)) {
        this.logger.warn(`Failed undecodable job ${taskKey}: ${issues}`);
      }
    }

    return records.map((record) => this.toDomainEntity(record));
  }

  async listByStatus(status: JobStatus): Promise<JobEntity[]> {
    const records = await this.dynamoDb.queryByStatus(status, { ascending: true });
    return records.map((record) => this.toDomainEntity(record));
  }

  async stats(): Promise<JobStats> {
    const counts = await Promise.all(
      ALL_JOB_STATUSES.map(async (status) => [status, await this.dynamoDb.countByStatus(status)] as const),
    );

    const stats: JobStats = {
      [JobStatus.PENDING]: 0,
      [JobStatus.EXECUTING]: 0,
      [JobStatus.COMPLETED]: 0,
      [JobStatus.FAILED]: 0,
    };
    for (const [status, count] of counts) {
      stats[status] = count;
    }
    return stats;
  }

  /**
   * DynamoDB has no OFFSET: read the first page*pageSize records of the index
   * newest first and slice the requested window.
   */
  async paginate(query: PaginateQuery): Promise<JobPage> {
    const window = query.page * query.pageSize;
    const offset = (query.page - 1) * query.pageSize;

    let records: JobRecord[];
    let total: number;

    if (query.status) {
      records = await this.dynamoDb.queryByStatus(query.status, { ascending: false, limit: window });
      total = await this.dynamoDb.countByStatus(query.status);
    } else {
      const perType = await Promise.all(
        Object.values(TaskType).map((taskType) =>
          this.dynamoDb.queryByTaskType(taskType, { ascending: false, limit: window }),
        ),
      );
      records = perType.flat().sort((a, b) => b.createdAt.localeCompare(a.createdAt));
      const stats = await this.stats();
      total = ALL_JOB_STATUSES.reduce((sum, status) => sum + stats[status], 0);
    }

    return {
      items: records.slice(offset, window).map((record) => this.toDomainEntity(record)),
      total,
      page: query.page,
      pageSize: query.pageSize,
    };
  }

  async delete(taskKey: string): Promise<boolean> {
    return this.dynamoDb.deleteJob(taskKey);
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await this.dynamoDb.ping();
    } catch (error) {
      this.logger.error(`Job table health check failed: ${String(error)}`);
      return false;
    }
  }

  private statusUpdate(change: StatusChange): JobRecordUpdate {
    const fields = JobEntity.statusFields(change);
    const remove: Array<'completedAt' | 'errorMessage'> = [];
    if (fields.completedAt === undefined) {
      remove.push('completedAt');
    }
    if (fields.errorMessage === undefined) {
      remove.push('errorMessage');
    }
    return {
      set: {
        status: fields.status,
        updatedAt: fields.updatedAt,
        completedAt: fields.completedAt,
        errorMessage: fields.errorMessage,
      },
      remove,
    };
  }

  private toRecord(job: JobEntity): JobRecord {
    return {
      taskKey: job.taskKey,
      id: job.id,
      taskType: job.taskType,
      payload: this.toRecordPayload(job.payload),
      status: job.status,
      attempts: job.attempts,
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
      completedAt: job.completedAt,
      errorMessage: job.errorMessage,
    };
  }

  private toRecordPayload(payload: JobPayload): JobRecord['payload'] {
    return {
      ...payload,
      selectedParts: payload.selectedParts ? [...payload.selectedParts] : undefined,
    };
  }

  private toDomainEntity(record: JobRecord): JobEntity {
    return {
      id: record.id,
      taskType: record.taskType,
      taskKey: record.taskKey,
      payload: record.payload,
      status: record.status,
      attempts: record.attempts,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
      completedAt: record.completedAt,
      errorMessage: record.errorMessage,
    };
  }
}
