import { z } from 'zod';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { wireJobStatusSchema } from './job-status.schema';

export const FAILED_REQUIRES_MESSAGE = 'error_message is required when status is FAILED';

export const updateStatusSchema = z
  .object({
    status: wireJobStatusSchema,
    error_message: z.string().trim().min(1).optional(),
  })
  .superRefine((body, ctx) => {
    if (body.status === JobStatus.FAILED && !body.error_message) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['error_message'],
        message: FAILED_REQUIRES_MESSAGE,
      });
    }
  });

export type UpdateStatusDto = z.infer<typeof updateStatusSchema>;
