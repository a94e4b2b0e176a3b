// src/common/errors.ts

import { HttpException, HttpStatus } from '@nestjs/common';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'INVALID_TRANSITION'
  | 'INTERNAL_ERROR';

/**
 * Base for every failure the services raise on purpose.
 * Extends HttpException so Nest maps the status without extra glue;
 * the ws layer reads `code` for its acks.
 */
export abstract class DomainError extends HttpException {
  abstract readonly code: ErrorCode;

  protected constructor(message: string, status: HttpStatus) {
    super(message, status);
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR' as const;

  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND' as const;

  constructor(message = 'Not found') {
    super(message, HttpStatus.NOT_FOUND);
  }
}

// 403: the caller is known but is not allowed to touch this record.
export class UnauthorizedError extends DomainError {
  readonly code = 'UNAUTHORIZED' as const;

  constructor(message = 'Not authorized') {
    super(message, HttpStatus.FORBIDDEN);
  }
}

export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION' as const;

  constructor(message: string) {
    super(message, HttpStatus.CONFLICT);
  }
}

export class InternalError extends DomainError {
  readonly code = 'INTERNAL_ERROR' as const;

  constructor(message = 'Internal server error') {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
