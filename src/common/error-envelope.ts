// src/common/error-envelope.ts

import { HttpException, HttpStatus } from '@nestjs/common';
import { DomainError } from './errors';

export type ErrorEnvelope = { error: string; code: string };
export type SuccessEnvelope<T extends object = object> = { success: true } & T;

const CODE_BY_STATUS: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'VALIDATION_ERROR',
  [HttpStatus.UNAUTHORIZED]: 'UNAUTHENTICATED',
  [HttpStatus.FORBIDDEN]: 'UNAUTHORIZED',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.CONFLICT]: 'INVALID_TRANSITION',
  [HttpStatus.TOO_MANY_REQUESTS]: 'RATE_LIMITED',
};

function messageOf(e: HttpException): string {
  const res = e.getResponse();
  if (typeof res === 'string') return res;
  if (res && typeof res === 'object' && 'message' in res) {
    const m = res.message;
    if (Array.isArray(m)) return m.map(String).join('; ');
    if (typeof m === 'string') return m;
  }
  return e.message;
}

/**
 * Maps any thrown value to `{ status, body }`.
 * Unknown errors collapse to a 500 without leaking their message.
 */
export function toErrorEnvelope(e: unknown): { status: number; body: ErrorEnvelope } {
  if (e instanceof DomainError) {
    return { status: e.getStatus(), body: { error: e.message, code: e.code } };
  }
  if (e instanceof HttpException) {
    const status = e.getStatus();
    return {
      status,
      body: { error: messageOf(e), code: CODE_BY_STATUS[status] ?? 'INTERNAL_ERROR' },
    };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
  };
}

export function ok<T extends object>(data: T): SuccessEnvelope<T>;
export function ok(): SuccessEnvelope;
export function ok<T extends object>(data?: T): SuccessEnvelope<T> | SuccessEnvelope {
  return { success: true, ...(data ?? {}) };
}
