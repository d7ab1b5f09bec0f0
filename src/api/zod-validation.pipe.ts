import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { ZodType, ZodTypeDef } from 'zod';

/**
 * Validates and converts a request part with a zod schema. Any issue is a 400
 * whose message lists the issue messages.
 */
@Injectable()
export class ZodValidationPipe<TOutput, TInput = unknown>
  implements PipeTransform<unknown, TOutput>
{
  constructor(private readonly schema: ZodType<TOutput, ZodTypeDef, TInput>) {}

  transform(value: unknown): TOutput {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      throw new BadRequestException(result.error.errors.map((e) => e.message).join('; '));
    }

    return result.data;
  }
}
