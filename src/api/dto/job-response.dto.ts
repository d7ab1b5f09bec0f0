import { JobEntity } from '../../domain/entities/job.entity';
import { JobStatusVO } from '../../domain/value-objects/job-status.vo';

export interface JobResponse {
  id: string;
  task_type: string;
  task_key: string;
  item_id: string;
  collection_id: string;
  selected_parts: number[] | null;
  name_template: string | null;
  status: string;
  attempts: number;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
  error_message: string | null;
}

export function toJobResponse(job: JobEntity): JobResponse {
  return {
    id: job.id,
    task_type: job.taskType,
    task_key: job.taskKey,
    item_id: job.payload.itemId,
    collection_id: job.payload.collectionId,
    selected_parts: job.payload.selectedParts ? [...job.payload.selectedParts] : null,
    name_template: job.payload.nameTemplate ?? null,
    status: JobStatusVO.of(job.status).wireValue,
    attempts: job.attempts,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    completed_at: job.completedAt ?? null,
    error_message: job.errorMessage ?? null,
  };
}
