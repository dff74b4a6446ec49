import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Shapes every error as HttpExceptionResponse.
 * Domain errors keep their name and details; anything unknown becomes a 500.
 */
export function toErrorBody(exception: unknown, path: string, timestamp: string): HttpExceptionResponse {
  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'InternalServerError',
      timestamp,
      path,
    };
  }

  const statusCode = exception.getStatus();
  const response = exception.getResponse();
  const body: HttpExceptionResponse = { statusCode, message: exception.message, timestamp, path };

  if (isRecord(response)) {
    const { message, error, details } = response;
    if (typeof message === 'string') {
      body.message = message;
    } else if (Array.isArray(message)) {
      // ValidationPipe reports one message per failed constraint
      body.message = message.map(String);
    }
    if (typeof error === 'string') {
      body.error = error;
    }
    if (isRecord(details)) {
      body.details = details;
    }
  }
  return body;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = toErrorBody(exception, request.url, new Date().toISOString());
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} -> ${body.statusCode} ${body.error ?? ''}`.trim());
    }

    response.status(body.statusCode).json(body);
  }
}
