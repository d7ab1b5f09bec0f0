export { submitTaskSchema, type SubmitTaskDto, type SubmitTaskResponse } from './submit-task.dto';
export {
  listTasksQuerySchema,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type ListTasksQuery,
  type ListTasksResponse,
} from './list-tasks.dto';
export { updateStatusSchema, FAILED_REQUIRES_MESSAGE, type UpdateStatusDto } from './update-status.dto';
export { toJobResponse, type JobResponse } from './job-response.dto';
export { wireJobStatusSchema } from './job-status.schema';
