import { PipeTransform, Injectable, UnprocessableEntityException } from '@nestjs/common';
import type { ArgumentMetadata } from '@nestjs/common';
import type { ZodSchema } from 'zod';

/**
 * Validates and transforms a request part with a shared zod schema.
 * Details name the failing part (body, query) so a bad hint in the
 * import query is told apart from a bad table in the body.
 */
@Injectable()
export class ZodValidationPipe implements PipeTransform {
  constructor(private readonly schema: ZodSchema) {}

  transform(value: unknown, metadata: ArgumentMetadata): unknown {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const part = metadata.data ? `${metadata.type}.${metadata.data}` : metadata.type;
      throw new UnprocessableEntityException({
        error: 'VALIDATION_ERROR',
        message: `Request ${part} validation failed`,
        details: result.error.issues.map((i) => ({
          part,
          path: i.path.join('.'),
          code: i.code,
          message: i.message,
        })),
      });
    }
    return result.data;
  }
}
