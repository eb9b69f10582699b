import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { isPlateLayoutError } from '@wellgrid/shared';

export interface ErrorResponseBody {
  success: false;
  error: { code: string; message: string; details?: unknown };
}

export interface ResolvedError {
  status: number;
  body: ErrorResponseBody;
}

function readField(source: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(source, key)
    ? Object.getOwnPropertyDescriptor(source, key)?.value
    : undefined;
}

/** "Bad Request" / "NotFound" → "BAD_REQUEST" / "NOT_FOUND" */
function toErrorCode(label: string): string {
  return label
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_');
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const { status, body } = this.resolve(exception);
    reply.status(status).send(body);
  }

  /** Map any thrown value to an HTTP status and error envelope */
  resolve(exception: unknown): ResolvedError {
    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_ERROR';
    let message = 'An unexpected error occurred';
    let details: unknown = undefined;

    if (isPlateLayoutError(exception)) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      code = exception.code;
      message = exception.message;
      details = { stage: exception.stage, ...exception.details };
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const response = exception.getResponse();
      if (typeof response === 'string') {
        message = response;
      } else {
        const msg = readField(response, 'message');
        const error = readField(response, 'error');
        if (typeof msg === 'string') message = msg;
        else if (Array.isArray(msg)) message = msg.map(String).join('; ');
        code = typeof error === 'string' ? toErrorCode(error) : toErrorCode(exception.name.replace(/Exception$/, ''));
        details = readField(response, 'details');
      }
    } else if (exception instanceof ZodError) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      code = 'VALIDATION_ERROR';
      message = 'Request validation failed';
      details = exception.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      }));
    } else if (exception instanceof Error) {
      message = exception.message;
      // Fastify plugin errors (e.g. upload over the size limit) carry their own status
      const statusCode = readField(exception, 'statusCode');
      const errorCode = readField(exception, 'code');
      if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
        status = statusCode;
        code = typeof errorCode === 'string' ? errorCode : toErrorCode(exception.name);
      }
    }

    if (status >= 500) {
      this.logger.error(
        `[${code}] ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else if (isPlateLayoutError(exception)) {
      this.logger.warn(`[${code}] ${message}`);
    }

    const error: ErrorResponseBody['error'] = { code, message };
    if (details !== undefined) error.details = details;
    return { status, body: { success: false, error } };
  }
}
