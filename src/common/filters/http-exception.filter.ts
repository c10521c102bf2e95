import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import {
  FORBIDDEN_BODY,
  INVALID_REQUEST_BODY,
  NOT_FOUND_BODY,
} from '../constants/error-messages.constants';

const INVALID_REQUEST_STATUSES: ReadonlySet<number> = new Set([
  HttpStatus.BAD_REQUEST,
  HttpStatus.UNPROCESSABLE_ENTITY,
]);

/**
 * Renders every exception that escapes a handler. Bodies never carry
 * exception messages or upstream text.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = createLogger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    if (status >= 500) {
      this.logger.error(
        'unhandled_exception',
        exception instanceof Error ? exception : undefined,
        {
          event: 'unhandled_exception',
          path: request.path,
          request_id: request.requestId,
        },
      );
      response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({});
      return;
    }

    if (status === HttpStatus.UNAUTHORIZED) {
      response.status(status).end();
      return;
    }

    response.status(status).json(renderClientError(status));
  }
}

export function renderClientError(status: number): { detail: string } {
  if (status === HttpStatus.FORBIDDEN) {
    return FORBIDDEN_BODY;
  }

  if (status === HttpStatus.NOT_FOUND) {
    return NOT_FOUND_BODY;
  }

  return INVALID_REQUEST_STATUSES.has(status) ? INVALID_REQUEST_BODY : { detail: 'Request failed.' };
}
