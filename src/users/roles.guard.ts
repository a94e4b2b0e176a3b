// src/users/roles.guard.ts

import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';

import type { AuthedRequest } from '../auth/auth.types';
import { UnauthorizedError } from '../common/errors';
import { ROLES_KEY } from './roles.decorator';
import { UsersService } from './users.service';

/** Runs after HttpAuthGuard; checks the caller's local roles. */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly users: UsersService,
  ) {}

  async canActivate(ctx: ExecutionContext): Promise<boolean> {
    const required = this.reflector.getAllAndOverride<string[] | undefined>(ROLES_KEY, [
      ctx.getHandler(),
      ctx.getClass(),
    ]);
    if (!required?.length) return true;

    const req = ctx.switchToHttp().getRequest<AuthedRequest>();
    const userId = req.principal?.userId;
    const roles = userId ? await this.users.rolesOf(userId) : [];

    if (!required.some((r) => roles.includes(r))) {
      throw new UnauthorizedError(`${required.join(' or ')} role required`);
    }
    return true;
  }
}
