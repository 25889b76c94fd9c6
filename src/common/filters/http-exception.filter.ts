import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse, ResolvedError } from './http-exception.types';
import { isDevelopment } from '@config/app.config';
import {
  errorMessage,
  getConstraintName,
  getHttpErrorName,
  isForeignKeyViolation,
  isLockTimeout,
  isUniqueViolation,
} from '@common/utils/error.util';

/**
 * Renders every failure as an {@link ErrorResponse}. Integrity and lock-wait errors
 * coming straight from PostgreSQL become 409; anything else unexpected is a 500 whose
 * detail is only exposed in development.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly exposeInternalErrors: boolean = isDevelopment()) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, message, error } = this.resolve(exception);
    const correlationId = request.headers['x-correlation-id'];

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      correlationId: typeof correlationId === 'string' ? correlationId : undefined,
    };

    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${errorMessage(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}`);
    }

    response.status(status).json(errorResponse);
  }

  private resolve(exception: unknown): ResolvedError {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        message: this.getHttpMessage(exception),
        error: this.getHttpErrorName(exception, status),
      };
    }

    if (isUniqueViolation(exception) || isForeignKeyViolation(exception)) {
      const constraint = getConstraintName(exception);
      return {
        status: HttpStatus.CONFLICT,
        message: constraint
          ? `Data integrity violation (${constraint})`
          : 'Data integrity violation',
        error: getHttpErrorName(HttpStatus.CONFLICT),
      };
    }

    if (isLockTimeout(exception)) {
      return {
        status: HttpStatus.CONFLICT,
        message: 'The requested resource is busy, please retry',
        error: getHttpErrorName(HttpStatus.CONFLICT),
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message:
        this.exposeInternalErrors && exception instanceof Error
          ? exception.message
          : 'Internal server error',
      error: getHttpErrorName(HttpStatus.INTERNAL_SERVER_ERROR),
    };
  }

  private getHttpMessage(exception: HttpException): string | string[] {
    const response = exception.getResponse();
    if (typeof response === 'object' && response !== null && 'message' in response) {
      const { message } = response;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.filter((item): item is string => typeof item === 'string');
      }
    }
    return exception.message;
  }

  private getHttpErrorName(exception: HttpException, status: number): string {
    const response = exception.getResponse();
    if (
      typeof response === 'object' &&
      response !== null &&
      'error' in response &&
      typeof response.error === 'string'
    ) {
      return response.error;
    }
    return getHttpErrorName(status);
  }
}
