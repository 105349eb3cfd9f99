import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { LoggerService } from '@/shared/logger/logger.service';
import {
  MatchingInProgressError,
  StorageUnavailableError,
} from '../errors/matching.errors';

export interface ErrorBody {
  success: false;
  statusCode: number;
  message: string | string[];
  error: string;
  path: string;
  timestamp: string;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { statusCode, message, error } = this.describe(exception);

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
        'HttpExceptionFilter',
      );
    }

    const body: ErrorBody = {
      success: false,
      statusCode,
      message,
      error,
      path: request.url,
      timestamp: new Date().toISOString(),
    };
    response.status(statusCode).json(body);
  }

  describe(exception: unknown): Pick<ErrorBody, 'statusCode' | 'message' | 'error'> {
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();
      if (typeof payload === 'object' && payload !== null && 'message' in payload) {
        const { message } = payload;
        return {
          statusCode,
          message: Array.isArray(message) ? message.map(String) : String(message),
          error: exception.name,
        };
      }
      return { statusCode, message: exception.message, error: exception.name };
    }

    if (exception instanceof MatchingInProgressError) {
      return {
        statusCode: HttpStatus.CONFLICT,
        message: exception.message,
        error: exception.name,
      };
    }

    if (exception instanceof StorageUnavailableError) {
      return {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: 'Storage is unavailable',
        error: exception.name,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'InternalServerError',
    };
  }
}
