// src/realtime/user-channel.registry.ts

import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';

/** Anything that can push an event to one connected client session. */
export interface SessionHandle {
  readonly id: string;
  emit(event: string, payload: unknown): unknown;
}

/**
 * userId -> live sessions. A user may be connected from several tabs or devices;
 * an event for the user goes to every one of them.
 */
@Injectable()
export class UserChannelRegistry {
  private readonly logger = new Logger(UserChannelRegistry.name);
  private readonly channels = new Map<string, Map<string, SessionHandle>>();

  /** Returns true when this is the user's first live session. */
  attach(userId: string, session: SessionHandle): boolean {
    let sessions = this.channels.get(userId);
    const first = !sessions || sessions.size === 0;
    if (!sessions) {
      sessions = new Map();
      this.channels.set(userId, sessions);
    }
    sessions.set(session.id, session);
    return first;
  }

  /** Returns true when the user's last live session went away. */
  detach(userId: string, sessionId: string): boolean {
    const sessions = this.channels.get(userId);
    if (!sessions || !sessions.delete(sessionId)) return false;
    if (sessions.size > 0) return false;
    this.channels.delete(userId);
    return true;
  }

  sessionsOf(userId: string): SessionHandle[] {
    return [...(this.channels.get(userId)?.values() ?? [])];
  }

  isConnected(userId: string): boolean {
    return (this.channels.get(userId)?.size ?? 0) > 0;
  }

  connectedUserIds(): string[] {
    return [...this.channels.keys()];
  }

  /**
   * Sends to every session of `userId` and returns how many took it.
   * Offline users are a silent drop (0).
   */
  deliver(userId: string, event: string, payload: unknown): number {
    let delivered = 0;
    // snapshot: a session may detach while we iterate
    for (const session of this.sessionsOf(userId)) {
      try {
        session.emit(event, payload);
        delivered += 1;
      } catch (e) {
        this.logger.warn(`deliver ${event} to user=${userId} session=${session.id} failed: ${errorMessage(e)}`);
      }
    }
    return delivered;
  }

  broadcast(event: string, payload: unknown, opts: { exceptUserId?: string } = {}): number {
    let delivered = 0;
    for (const userId of this.connectedUserIds()) {
      if (userId === opts.exceptUserId) continue;
      delivered += this.deliver(userId, event, payload);
    }
    return delivered;
  }
}
