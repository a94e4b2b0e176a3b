// src/common/error-envelope.filter.ts

import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { toErrorEnvelope } from './error-envelope';

@Catch()
export class ErrorEnvelopeFilter implements ExceptionFilter {
  private readonly logger = new Logger('Errors');

  catch(exception: unknown, host: ArgumentsHost) {
    if (host.getType() !== 'http') return;

    const { status, body } = toErrorEnvelope(exception);
    if (!(exception instanceof HttpException)) {
      const stack = exception instanceof Error ? exception.stack : String(exception);
      this.logger.error(`unhandled error: ${stack}`);
    }

    const reply = host.switchToHttp().getResponse<FastifyReply>();
    void reply.status(status).send(body);
  }
}
