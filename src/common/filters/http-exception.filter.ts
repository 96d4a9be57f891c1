import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { isDomainFailureResponse } from '../exceptions/domain-failure';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
}

const MALFORMED_REQUEST = 'MalformedRequest';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readMessage(value: unknown, fallback: string): string | string[] {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
    return value;
  }
  return fallback;
}

/**
 * Shapes any thrown value into the error body every endpoint returns.
 * Domain failures keep their kind in `error`; other 400s come from body
 * validation and are reported as MalformedRequest.
 */
export function buildErrorResponse(
  exception: unknown,
  path: string,
  now: Date = new Date(),
): ErrorResponseBody {
  const timestamp = now.toISOString();

  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'Internal Server Error',
      message: 'Internal server error',
      path,
      timestamp,
    };
  }

  const statusCode = exception.getStatus();
  const response = exception.getResponse();
  if (!isRecord(response)) {
    return {
      statusCode,
      error: exception.name,
      message: readMessage(response, exception.message),
      path,
      timestamp,
    };
  }

  let error: string;
  if (isDomainFailureResponse(response)) {
    error = response.error;
  } else if (statusCode === HttpStatus.BAD_REQUEST) {
    error = MALFORMED_REQUEST;
  } else {
    error = typeof response.error === 'string' ? response.error : exception.name;
  }

  return {
    statusCode,
    error,
    message: readMessage(response.message, exception.message),
    path,
    timestamp,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const body = buildErrorResponse(exception, request.url);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(
        `${request.method} ${request.url} failed: ${String(exception)}`,
        stack,
      );
    }

    response.status(body.statusCode).json(body);
  }
}
