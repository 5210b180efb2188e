import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../interceptors/logging.interceptor';

export interface ErrorBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: string | string[];
}

function messageOf(exception: HttpException): string | string[] {
  const exceptionResponse = exception.getResponse();
  if (typeof exceptionResponse === 'string') return exceptionResponse;
  if ('message' in exceptionResponse) {
    const { message } = exceptionResponse;
    if (typeof message === 'string') return message;
    // ValidationPipe reports one message per failed constraint
    if (Array.isArray(message)) return message.map(String);
  }
  return exception.message;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';
    let error = 'Internal Server Error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = messageOf(exception);
      error = exception.name;
    } else if (exception instanceof Error) {
      // unexpected failures keep their details in the log only
      error = exception.name;
    }

    const logLine = `${request.method} ${request.url} ${status} - ${Array.isArray(message) ? message.join('; ') : message}`;
    if (status >= 500) {
      Logger.error(
        logLine,
        exception instanceof Error ? exception.stack || 'No stack trace available' : String(exception),
        'HttpExceptionFilter',
      );
    } else {
      Logger.warn(logLine, 'HttpExceptionFilter');
    }

    const body: ErrorBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      error,
      message,
    };
    response.status(status).json(body);
  }
}
