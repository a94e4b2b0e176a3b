// src/users/roles.decorator.ts

import { SetMetadata } from '@nestjs/common';

export const ROLES_KEY = 'roles';

/** Any one of the listed roles admits the request. */
export const Roles = (...roles: string[]) => SetMetadata(ROLES_KEY, roles);
