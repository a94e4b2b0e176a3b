import { randomUUID } from 'crypto';
import type { FastifyReply } from 'fastify';
import type { AuthedRequest } from '../auth/auth.types';

/** Fastify onRequest hook: reuse the caller's x-request-id or mint one, echo it back. */
export function requestIdMiddleware(req: AuthedRequest, res: FastifyReply, next: () => void) {
  const header = req.headers['x-request-id'];
  const incoming = (Array.isArray(header) ? header[0] : header) ?? '';
  const id = incoming.trim() || randomUUID();
  req.requestId = id;
  void res.header('x-request-id', id);
  next();
}
