import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AuthExceptionFilter } from './auth-exception.filter';
import { RbacExceptionFilter } from './rbac-exception.filter';

const readMessage = (body: object, fallback: string): string | string[] => {
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m) => typeof m === 'string')) {
      return message;
    }
  }
  return fallback;
};

const readError = (body: object, fallback: string): string =>
  'error' in body && typeof body.error === 'string' ? body.error : fallback;

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);
  private readonly authExceptionFilter = new AuthExceptionFilter();
  private readonly rbacExceptionFilter = new RbacExceptionFilter();

  catch(exception: unknown, host: ArgumentsHost): void {
    if (exception instanceof UnauthorizedException) {
      this.authExceptionFilter.catch(exception, host);
      return;
    }
    if (exception instanceof ForbiddenException) {
      this.rbacExceptionFilter.catch(exception, host);
      return;
    }
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number;
    let message: string | string[];
    let error: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const errorResponse = exception.getResponse();

      if (typeof errorResponse === 'object' && errorResponse !== null) {
        message = readMessage(errorResponse, exception.message);
        error = readError(errorResponse, 'Http Exception');
      } else {
        message = String(errorResponse);
        error = 'Http Exception';
      }
    } else {
      // internal details never leave the process
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'An unexpected error occurred';
      error = 'Internal Server Error';
    }

    this.logger.error(
      `${request.method} ${request.url} - ${status} - ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      error,
      message,
    });
  }
}
