// src/auth/internal-auth.guard.ts

import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyRequest } from 'fastify';
import type { AppConfig } from '../config/configuration';

@Injectable()
export class InternalAuthGuard implements CanActivate {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<FastifyRequest>();
    const expected = this.config.get('auth', { infer: true }).internalToken;
    const got = req.headers['x-internal-auth'] ?? '';
    if (!expected || got !== expected) {
      throw new UnauthorizedException('Invalid internal auth');
    }
    return true;
  }
}
