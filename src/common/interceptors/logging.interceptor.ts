import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type Level = (typeof LEVELS)[number];

const isLevel = (value: string): value is Level => (LEVELS as readonly string[]).includes(value);

// Request fields that must never reach the log
const REDACTED_FIELDS = ['password', 'joinCode'];

const envLevel = process.env.LOG_LEVEL ?? '';

export class Logger {
  private static logLevel: Level = isLevel(envLevel) ? envLevel : 'debug';

  static setLevel(level: string) {
    if (isLevel(level)) this.logLevel = level;
  }

  private static enabled(level: Level) {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  static log(message: string, context?: string) {
    if (this.enabled('info')) {
      console.log(`[LOG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`[ERROR] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (this.enabled('warn')) {
      console.warn(`[WARN] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (this.enabled('debug')) {
      console.debug(`[DEBUG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value === null || typeof value !== 'object') return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [key, REDACTED_FIELDS.includes(key) ? '***' : redact(inner)]),
  );
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, body, query, params } = request;

    Logger.debug(
      `Request: ${method} ${url} \nBody: ${JSON.stringify(redact(body))} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        Logger.debug(`Response: ${method} ${url} ${Date.now() - now}ms`, 'LoggingInterceptor');
      }),
    );
  }
}
