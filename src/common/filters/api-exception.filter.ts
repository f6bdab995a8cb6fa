import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import type { RequestWithId } from '../request-id';

type ApiError = {
  code: number;
  message: string;
  reason?: string;
};

type ErrorEnvelope = {
  meta: {
    status: number;
    errors: ApiError[];
    requestId?: string;
  };
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): { message: string; reason?: string } {
  const res = exception.getResponse();
  if (typeof res === 'string') return { message: res };
  if (isObject(res)) {
    const message = res.message;
    const error = res.error;
    if (Array.isArray(message)) {
      return { message: message.join('\n'), reason: typeof error === 'string' ? error : undefined };
    }
    if (typeof message === 'string') {
      return { message, reason: typeof error === 'string' ? error : undefined };
    }
  }
  return { message: exception.message };
}

function envelope(status: number, errors: ApiError[], requestId: string | null): ErrorEnvelope {
  return { meta: { status, errors, ...(requestId ? { requestId } : {}) } };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('API');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<RequestWithId | undefined>();
    const requestId = req?.requestId ?? null;

    // Zod validation errors
    if (exception instanceof ZodError) {
      const errors: ApiError[] = exception.issues.map((i) => ({
        code: HttpStatus.BAD_REQUEST,
        message: i.message,
        reason: i.path.length ? i.path.join('.') : 'validation',
      }));
      return res
        .status(HttpStatus.BAD_REQUEST)
        .json(
          envelope(
            HttpStatus.BAD_REQUEST,
            errors.length ? errors : [{ code: HttpStatus.BAD_REQUEST, message: 'Invalid request', reason: 'validation' }],
            requestId,
          ),
        );
    }

    // Nest HTTP exceptions
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const { message, reason } = extractHttpMessage(exception);
      return res.status(status).json(envelope(status, [{ code: status, message, reason }], requestId));
    }

    // Unknown: return a safe envelope, log the underlying error.
    this.logger.error(
      `Unhandled exception${requestId ? ` rid=${requestId}` : ''}: ${(exception as Error)?.message ?? String(exception)}`,
      (exception as Error)?.stack,
    );
    return res
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .json(
        envelope(
          HttpStatus.INTERNAL_SERVER_ERROR,
          [{ code: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error', reason: 'internal_error' }],
          requestId,
        ),
      );
  }
}
