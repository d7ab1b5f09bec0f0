import { z } from 'zod';
import { wireJobStatusSchema } from './job-status.schema';
import { JobResponse } from './job-response.dto';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export const listTasksQuerySchema = z.object({
  page: z.coerce.number().int('page must be an integer').min(1, 'page must be >= 1').default(1),
  page_size: z.coerce
    .number()
    .int('page_size must be an integer')
    .min(1, 'page_size must be >= 1')
    .max(MAX_PAGE_SIZE, `page_size must be <= ${MAX_PAGE_SIZE}`)
    .default(DEFAULT_PAGE_SIZE),
  status: wireJobStatusSchema.optional(),
});

export type ListTasksQuery = z.infer<typeof listTasksQuerySchema>;

export interface ListTasksResponse {
  items: JobResponse[];
  total: number;
  page: number;
  page_size: number;
}
