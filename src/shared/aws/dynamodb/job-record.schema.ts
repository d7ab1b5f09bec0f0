import { z } from 'zod';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';
import { TaskType } from '../../../domain/value-objects/job-payload.vo';

export const mediaDownloadPayloadSchema = z.object({
  kind: z.literal(TaskType.MEDIA_DOWNLOAD),
  itemId: z.string().min(1),
  collectionId: z.string().min(1),
  selectedParts: z.array(z.number().int().positive()).optional(),
  nameTemplate: z.string().min(1).optional(),
});

export const jobPayloadSchema = z.discriminatedUnion('kind', [mediaDownloadPayloadSchema]);

/**
 * Shape of one item in the jobs table
 */
export const jobRecordSchema = z.object({
  taskKey: z.string().min(1),
  id: z.string().min(1),
  taskType: z.nativeEnum(TaskType),
  payload: jobPayloadSchema,
  status: z.nativeEnum(JobStatus),
  attempts: z.number().int().nonnegative().default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
  errorMessage: z.string().optional(),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;

export const JOB_TABLE_INDEXES = {
  byId: 'id-index',
  byStatus: 'status-index',
  byTaskType: 'task-type-index',
} as const;
