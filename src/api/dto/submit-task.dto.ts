import { z } from 'zod';
import { API_COLLECTION_ID } from '../../domain/value-objects/task-key.vo';

export const submitTaskSchema = z.object({
  bid: z.string({ required_error: 'bid is required' }).trim().min(1, 'bid cannot be empty'),
  favid: z.coerce.string().trim().min(1, 'favid cannot be empty').default(API_COLLECTION_ID),
  selectedParts: z
    .array(z.number().int().positive('selectedParts must be positive part numbers'))
    .optional(),
  nameTemplate: z.string().trim().min(1, 'nameTemplate cannot be empty').optional(),
});

export type SubmitTaskDto = z.infer<typeof submitTaskSchema>;

export interface SubmitTaskResponse {
  status: 'success' | 'updated';
  message: string;
}
