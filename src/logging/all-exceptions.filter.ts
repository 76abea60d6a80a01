import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request';
import { JsonLogger } from './json-logger.service';

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<AuthenticatedRequest>();
    const res = ctx.getResponse<Response>();

    const isHttp = exception instanceof HttpException;
    const statusCode = isHttp ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;

    const meta: Record<string, unknown> = {
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl?.split('?')[0] ?? req.url,
      statusCode,
    };
    if (req.user?.sub) meta.userId = req.user.sub;

    if (exception instanceof Error) {
      meta.errorName = exception.name;
      meta.errorMessage = exception.message;
      if (statusCode >= 500) meta.stack = exception.stack;
    } else {
      meta.error = String(exception);
    }

    if (statusCode >= 500) {
      this.logger.error('Unhandled exception', meta);
    } else {
      this.logger.warn('Request failed', meta);
    }

    // Stack traces stay in the logs.
    const body = isHttp ? exception.getResponse() : { statusCode, message: 'Internal server error' };
    res.status(statusCode).json(typeof body === 'string' ? { statusCode, message: body } : body);
  }
}
