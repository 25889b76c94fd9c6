import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { errorMessage } from '@common/utils/error.util';

/** Requests slower than this are logged at warn level. */
export const SLOW_REQUEST_MS = 1000;

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;
    const userAgent = request.get('user-agent') || '';
    const startedAt = Date.now();

    this.logger.log(`[REQUEST] ${method} ${url} - IP: ${request.ip} - User-Agent: ${userAgent}`);

    const body: unknown = request.body;
    if (body && typeof body === 'object' && Object.keys(body).length > 0) {
      this.logger.debug(`[REQUEST BODY] ${JSON.stringify(body)}`);
    }

    return next.handle().pipe(
      tap({
        next: () => {
          const { statusCode } = context.switchToHttp().getResponse<Response>();
          const duration = Date.now() - startedAt;
          const line = `[RESPONSE] ${method} ${url} - ${statusCode} - ${duration}ms`;

          if (duration >= SLOW_REQUEST_MS) {
            this.logger.warn(`${line} (slow)`);
          } else {
            this.logger.log(line);
          }
        },
        error: (error: unknown) => {
          const duration = Date.now() - startedAt;
          const statusCode =
            error instanceof HttpException ? error.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
          const line = `[ERROR] ${method} ${url} - ${statusCode} - ${duration}ms - ${errorMessage(error)}`;

          // client errors are expected traffic (sold seats, closed showtimes)
          if (statusCode < 500) {
            this.logger.warn(line);
          } else {
            this.logger.error(line);
          }
        },
      }),
    );
  }
}
