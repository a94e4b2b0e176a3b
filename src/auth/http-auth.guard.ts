// src/auth/http-auth.guard.ts

import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { SessionAuthService } from './session-auth.service';
import { AuthedRequest, bearerFrom } from './auth.types';

@Injectable()
export class HttpAuthGuard implements CanActivate {
  constructor(private readonly auth: SessionAuthService) {}

  async canActivate(ctx: ExecutionContext): Promise<boolean> {
    const req = ctx.switchToHttp().getRequest<AuthedRequest>();
    const token = bearerFrom(req.headers.authorization);
    if (!token) throw new UnauthorizedException('Missing bearer token');

    req.principal = await this.auth.introspect(token);
    return true;
  }
}
