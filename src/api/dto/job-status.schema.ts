import { z } from 'zod';
import { ALL_JOB_STATUSES, JobStatus, isJobStatus } from '../../domain/value-objects/job-status.vo';

const WIRE_STATUSES = ALL_JOB_STATUSES.map((status) => status.toLowerCase()).join(', ');

/**
 * Status as written by clients (`pending`, `failed`, ...), case-insensitive.
 */
export const wireJobStatusSchema = z
  .string({ required_error: 'status is required' })
  .transform((value) => value.trim().toUpperCase())
  .refine((value): value is JobStatus => isJobStatus(value), {
    message: `status must be one of ${WIRE_STATUSES}`,
  });
