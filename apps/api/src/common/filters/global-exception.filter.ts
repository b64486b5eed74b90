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
import type { ApiError } from '@sheetstruct/shared';
import { ExtractionError, type ExtractionFailureKind } from '../../modules/extraction/extraction.errors';

const EXTRACTION_FAILURES: Record<ExtractionFailureKind, { status: HttpStatus; code: string }> = {
  corrupted: { status: HttpStatus.UNPROCESSABLE_ENTITY, code: 'WORKBOOK_CORRUPTED' },
  timeout: { status: HttpStatus.GATEWAY_TIMEOUT, code: 'EXTRACTION_TIMEOUT' },
  other: { status: HttpStatus.INTERNAL_SERVER_ERROR, code: 'EXTRACTION_FAILED' },
};

export interface ErrorBody {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const { status, code, message, details } = this.toErrorBody(exception);

    if (status >= 500) {
      this.logger.error(
        `[${code}] ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ApiError = { success: false, error: { code, message, details } };
    void reply.status(status).send(body);
  }

  toErrorBody(exception: unknown): ErrorBody {
    if (exception instanceof ExtractionError) {
      return { ...EXTRACTION_FAILURES[exception.kind], message: exception.message };
    }

    if (exception instanceof HttpException) {
      const body: ErrorBody = { status: exception.getStatus(), code: 'INTERNAL_ERROR', message: exception.message };
      const response = exception.getResponse();
      if (typeof response === 'string') {
        body.message = response;
      } else if (typeof response === 'object' && response !== null) {
        if ('message' in response && typeof response.message === 'string') body.message = response.message;
        if ('error' in response && typeof response.error === 'string') body.code = response.error;
        if ('details' in response) body.details = response.details;
      }
      return body;
    }

    if (exception instanceof ZodError) {
      return {
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: exception.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_ERROR',
      message: exception instanceof Error ? exception.message : 'An unexpected error occurred',
    };
  }
}
