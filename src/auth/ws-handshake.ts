// src/auth/ws-handshake.ts

import { Logger } from '@nestjs/common';
import { SessionAuthService } from './session-auth.service';
import { AuthedSocket, bearerFrom } from './auth.types';

type Next = (err?: Error) => void;

/**
 * socket.io middleware: authenticates the handshake once and pins the principal
 * on the socket. Refuses the connection when no valid token is presented.
 */
export function wsHandshakeAuth(auth: SessionAuthService) {
  const log = new Logger('WsHandshake');

  return (socket: AuthedSocket, next: Next): void => {
    const fromAuth: unknown = socket.handshake.auth?.token;
    const token =
      (typeof fromAuth === 'string' && fromAuth.trim()) || bearerFrom(socket.handshake.headers.authorization);

    if (!token) {
      log.warn(`handshake refused: missing token socket=${socket.id}`);
      next(new Error('Unauthorized: missing token'));
      return;
    }

    auth
      .introspect(token)
      .then((principal) => {
        socket.principal = principal;
        next();
      })
      .catch((err: unknown) => {
        log.warn(`handshake refused socket=${socket.id}: ${err instanceof Error ? err.message : String(err)}`);
        next(new Error('Unauthorized: invalid token'));
      });
  };
}

