import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

interface ErrorBody {
  statusCode: number;
  message: string | string[];
  error: string;
  path: string;
  timestamp: string;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body: ErrorBody =
      exception instanceof HttpException
        ? this.fromHttpException(exception, request.url)
        : {
            statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
            message: 'Internal server error',
            error: 'Internal Server Error',
            path: request.url,
            timestamp: new Date().toISOString(),
          };

    if (body.statusCode >= 500) {
      this.logger.error(`${request.method} ${request.url} failed`, exception);
    }

    response.status(body.statusCode).json(body);
  }

  private fromHttpException(exception: HttpException, path: string): ErrorBody {
    const statusCode = exception.getStatus();
    const payload = exception.getResponse();
    let message: string | string[] = exception.message;
    let error = exception.name;

    if (typeof payload === 'object' && payload !== null) {
      if ('message' in payload) {
        const raw = payload.message;
        if (typeof raw === 'string') {
          message = raw;
        } else if (Array.isArray(raw)) {
          message = raw.map((item) => String(item));
        }
      }
      if ('error' in payload && typeof payload.error === 'string') {
        error = payload.error;
      }
    }

    return {
      statusCode,
      message,
      error,
      path,
      timestamp: new Date().toISOString(),
    };
  }
}
