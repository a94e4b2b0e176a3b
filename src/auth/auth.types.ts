// src/auth/auth.types.ts

import type { FastifyRequest } from 'fastify';
import type { Socket } from 'socket.io';

export type Principal = {
  userId: string;
  username: string;
  displayName: string;
};

export type AuthedRequest = FastifyRequest & { principal?: Principal; requestId?: string };
export type AuthedSocket = Socket & { principal?: Principal };

export function bearerFrom(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  return value?.startsWith('Bearer ') ? value.slice('Bearer '.length).trim() || undefined : undefined;
}
