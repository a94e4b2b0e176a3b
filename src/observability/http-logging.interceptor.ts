import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

import type { AuthedRequest } from '../auth/auth.types';
import { MetricsService } from './metrics.service';

@Injectable()
export class HttpLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    const ctx = context.switchToHttp();
    const req = ctx.getRequest<AuthedRequest>();
    const res = ctx.getResponse<FastifyReply>();

    const method = req.method;
    const url = req.url;
    const rid = req.requestId;

    const start = Date.now();
    return next.handle().pipe(
      tap({
        next: () => {
          const ms = Date.now() - start;
          this.metrics.observeMs('http_request', ms, { method });
          this.logger.log(`${method} ${url} ${res.statusCode} ${ms}ms rid=${rid ?? '-'}`);
        },
        error: (err: unknown) => {
          const ms = Date.now() - start;
          this.logger.warn(`${method} ${url} failed ${ms}ms rid=${rid ?? '-'}: ${err instanceof Error ? err.message : String(err)}`);
        },
      }),
    );
  }
}
