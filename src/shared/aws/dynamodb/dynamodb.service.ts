import { Injectable, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  waitUntilTableExists,
} from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandInput,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';
import { TaskType } from '../../../domain/value-objects/job-payload.vo';
import { PinoLoggerService } from '../../logging/pino-logger.service';
import { JOB_TABLE_INDEXES, JobRecord, jobRecordSchema } from './job-record.schema';

/**
 * Attribute changes for one update. `remove` lists attributes to delete.
 */
export interface JobRecordUpdate {
  set: Partial<Omit<JobRecord, 'taskKey' | 'id' | 'createdAt' | 'attempts'>>;
  remove?: Array<'completedAt' | 'errorMessage'>;
  /** Apply only when the stored status equals this value */
  expectedStatus?: JobStatus;
  incrementAttempts?: boolean;
  resetAttempts?: boolean;
}

export interface IndexQueryOptions {
  /** Stop after collecting this many records */
  limit?: number;
  ascending: boolean;
  /** Called for each item that fails validation; the item is left out of the result */
  onMalformed?: (taskKey: string, issues: string) => void;
}

export function isConditionalCheckFailure(error: unknown): boolean {
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

function isResourceNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === 'ResourceNotFoundException';
}

@Injectable()
export class DynamoDbService implements OnModuleInit, OnApplicationShutdown {
  private readonly tableName: string;
  private readonly createTable: boolean;

  constructor(
    private readonly client: DynamoDBClient,
    private readonly docClient: DynamoDBDocumentClient,
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const dynamoConfig = this.configService.get('dynamodb', { infer: true });
    this.tableName = dynamoConfig.tableName;
    this.createTable = dynamoConfig.createTable;
    this.logger.setContext(DynamoDbService.name);
  }

  /**
   * Startup check. A missing table is fatal unless table creation is enabled.
   */
  async onModuleInit(): Promise<void> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
      this.logger.info({ tableName: this.tableName }, 'Job table available');
    } catch (error) {
      if (!isResourceNotFound(error) || !this.createTable) {
        throw error;
      }
      await this.createJobTable();
    }
  }

  async putJob(record: JobRecord): Promise<void> {
    await this.docClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: record,
        ConditionExpression: 'attribute_not_exists(taskKey)',
      }),
    );

    this.logger.debug({ taskKey: record.taskKey }, 'Job record created');
  }

  async getJob(taskKey: string): Promise<JobRecord | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { taskKey },
        ConsistentRead: true,
      }),
    );

    return result.Item ? jobRecordSchema.parse(result.Item) : null;
  }

  async findJobById(id: string): Promise<JobRecord | null> {
    const result = await this.docClient.send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: JOB_TABLE_INDEXES.byId,
        KeyConditionExpression: 'id = :id',
        ExpressionAttributeValues: { ':id': id },
        Limit: 1,
      }),
    );

    const item = result.Items?.[0];
    return item ? jobRecordSchema.parse(item) : null;
  }

  /**
   * Atomic single-item update. Returns null when the item is missing or the
   * expected status no longer matches.
   */
  async updateJob(taskKey: string, update: JobRecordUpdate): Promise<JobRecord | null> {
    const names: Record<string, string> = {};
    const values: Record<string, unknown> = {};
    const setClauses: string[] = [];

    for (const [attribute, value] of Object.entries(update.set)) {
      if (value === undefined) {
        continue;
      }
      names[`#${attribute}`] = attribute;
      values[`:${attribute}`] = value;
      setClauses.push(`#${attribute} = :${attribute}`);
    }

    if (update.incrementAttempts) {
      names['#attempts'] = 'attempts';
      values[':zero'] = 0;
      values[':one'] = 1;
      setClauses.push('#attempts = if_not_exists(#attempts, :zero) + :one');
    } else if (update.resetAttempts) {
      names['#attempts'] = 'attempts';
      values[':zero'] = 0;
      setClauses.push('#attempts = :zero');
    }

    const removed = update.remove ?? [];
    for (const attribute of removed) {
      names[`#${attribute}`] = attribute;
    }

    let updateExpression = `SET ${setClauses.join(', ')}`;
    if (removed.length > 0) {
      updateExpression += ` REMOVE ${removed.map((attribute) => `#${attribute}`).join(', ')}`;
    }

    let conditionExpression = 'attribute_exists(taskKey)';
    if (update.expectedStatus) {
      names['#status'] = 'status';
      values[':expectedStatus'] = update.expectedStatus;
      conditionExpression += ' AND #status = :expectedStatus';
    }

    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { taskKey },
          UpdateExpression: updateExpression,
          ConditionExpression: conditionExpression,
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_NEW',
        }),
      );
      return result.Attributes ? jobRecordSchema.parse(result.Attributes) : null;
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Marks a PENDING item whose contents no longer validate as FAILED without
   * reading it back through the record schema.
   */
  async failMalformedJob(taskKey: string, errorMessage: string): Promise<boolean> {
    try {
      await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { taskKey },
          UpdateExpression: 'SET #status = :failed, errorMessage = :errorMessage, updatedAt = :now',
          ConditionExpression: '#status = :pending',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: {
            ':failed': JobStatus.FAILED,
            ':pending': JobStatus.PENDING,
            ':errorMessage': errorMessage,
            ':now': new Date().toISOString(),
          },
        }),
      );
      return true;
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        return false;
      }
      throw error;
    }
  }

  async queryByStatus(status: JobStatus, options: IndexQueryOptions): Promise<JobRecord[]> {
    return this.queryAll(
      {
        IndexName: JOB_TABLE_INDEXES.byStatus,
        KeyConditionExpression: '#status = :status',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: { ':status': status },
        ScanIndexForward: options.ascending,
      },
      options.limit,
      options.onMalformed,
    );
  }

  async queryByTaskType(taskType: TaskType, options: IndexQueryOptions): Promise<JobRecord[]> {
    return this.queryAll(
      {
        IndexName: JOB_TABLE_INDEXES.byTaskType,
        KeyConditionExpression: 'taskType = :taskType',
        ExpressionAttributeValues: { ':taskType': taskType },
        ScanIndexForward: options.ascending,
      },
      options.limit,
      options.onMalformed,
    );
  }

  async countByStatus(status: JobStatus): Promise<number> {
    let total = 0;
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: JOB_TABLE_INDEXES.byStatus,
          KeyConditionExpression: '#status = :status',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: { ':status': status },
          Select: 'COUNT',
          ExclusiveStartKey: startKey,
        }),
      );
      total += result.Count ?? 0;
      startKey = result.LastEvaluatedKey;
    } while (startKey);

    return total;
  }

  async deleteJob(taskKey: string): Promise<boolean> {
    const result = await this.docClient.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: { taskKey },
        ReturnValues: 'ALL_OLD',
      }),
    );

    const deleted = result.Attributes !== undefined;
    if (deleted) {
      this.logger.info({ taskKey }, 'Job record deleted');
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    const result = await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
    return result.Table?.TableStatus === 'ACTIVE';
  }

  /**
   * Runs after every module has stopped, so in-flight job writes land first.
   */
  onApplicationShutdown() {
    this.client.destroy();
  }

  /**
   * Follows LastEvaluatedKey until the limit is met or the index is exhausted.
   * Items that fail validation are logged and skipped.
   */
  private async queryAll(
    input: Omit<QueryCommandInput, 'TableName'>,
    limit?: number,
    onMalformed?: (taskKey: string, issues: string) => void,
  ): Promise<JobRecord[]> {
    const records: JobRecord[] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          ...input,
          TableName: this.tableName,
          ExclusiveStartKey: startKey,
          ...(limit !== undefined && { Limit: limit - records.length }),
        }),
      );

      for (const item of result.Items ?? []) {
        const parsed = jobRecordSchema.safeParse(item);
        if (parsed.success) {
          records.push(parsed.data);
        } else {
          const taskKey = String(item.taskKey);
          this.logger.error({ taskKey, issues: parsed.error.message }, 'Skipping malformed job record');
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
          onMalformed?.(taskKey, issues);
        }
      }
      startKey = result.LastEvaluatedKey;
    } while (startKey && (limit === undefined || records.length < limit));

    return records;
  }

  private async createJobTable(): Promise<void> {
    this.logger.warn({ tableName: this.tableName }, 'Job table missing, creating it');

    const projection = { ProjectionType: 'ALL' as const };
    await this.client.send(
      new CreateTableCommand({
        TableName: this.tableName,
        BillingMode: 'PAY_PER_REQUEST',
        AttributeDefinitions: [
          { AttributeName: 'taskKey', AttributeType: 'S' },
          { AttributeName: 'id', AttributeType: 'S' },
          { AttributeName: 'status', AttributeType: 'S' },
          { AttributeName: 'taskType', AttributeType: 'S' },
          { AttributeName: 'createdAt', AttributeType: 'S' },
        ],
        KeySchema: [{ AttributeName: 'taskKey', KeyType: 'HASH' }],
        GlobalSecondaryIndexes: [
          {
            IndexName: JOB_TABLE_INDEXES.byId,
            KeySchema: [{ AttributeName: 'id', KeyType: 'HASH' }],
            Projection: projection,
          },
          {
            IndexName: JOB_TABLE_INDEXES.byStatus,
            KeySchema: [
              { AttributeName: 'status', KeyType: 'HASH' },
              { AttributeName: 'createdAt', KeyType: 'RANGE' },
            ],
            Projection: projection,
          },
          {
            IndexName: JOB_TABLE_INDEXES.byTaskType,
            KeySchema: [
              { AttributeName: 'taskType', KeyType: 'HASH' },
              { AttributeName: 'createdAt', KeyType: 'RANGE' },
            ],
            Projection: projection,
          },
        ],
      }),
    );

    await waitUntilTableExists(
      { client: this.client, maxWaitTime: 60 },
      { TableName: this.tableName },
    );
    this.logger.info({ tableName: this.tableName }, 'Job table created');
  }
}
