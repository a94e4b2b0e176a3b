// src/main.ts

import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import fastifyCors from '@fastify/cors';

import { AppModule } from './app.module';
import { ErrorEnvelopeFilter } from './common/error-envelope.filter';
import type { AppConfig } from './config/configuration';
import { requestIdMiddleware } from './observability/request-id.middleware';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter({ logger: true }));
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);

  const origins = config.get('origins', { infer: true });
  await app.register(fastifyCors, {
    origin: (origin, cb) => cb(null, !origin || origins.length === 0 || origins.includes(origin)),
    credentials: true,
  });

  app.getHttpAdapter().getInstance().addHook('onRequest', requestIdMiddleware);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true, forbidUnknownValues: true }));
  app.useGlobalFilters(new ErrorEnvelopeFilter());
  app.enableShutdownHooks();

  const port = config.get('port', { infer: true });
  await app.listen({ port, host: '0.0.0.0' });
  Logger.log(`listening on :${port} (ws path ${config.get('wsPath', { infer: true })})`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
