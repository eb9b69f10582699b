import {
  Injectable,
  Logger,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { Observable, map, tap } from 'rxjs';

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

@Injectable()
export class ResponseTransformInterceptor<T>
  implements NestInterceptor<T, SuccessResponse<T>>
{
  private readonly logger = new Logger(ResponseTransformInterceptor.name);

  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<SuccessResponse<T>> {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap(() => {
        this.logger.debug(`${request.method} ${request.url} handled in ${Date.now() - startedAt}ms`);
      }),
      map((data) => ({
        success: true as const,
        data,
      })),
    );
  }
}
