// src/testing/fakes.ts

import { ConfigService } from '@nestjs/config';

import type { Principal } from '../auth/auth.types';
import { AppConfig, loadConfig } from '../config/configuration';
import type { SessionHandle } from '../realtime/user-channel.registry';
import { PublicProfile, UserDirectory } from '../users/user-directory';

export class FakeUserDirectory extends UserDirectory {
  private readonly profiles = new Map<string, PublicProfile>();

  add(id: string, opts: { name?: string; phoneNumber?: string | null } = {}): this {
    this.profiles.set(id, {
      id,
      name: opts.name ?? `User ${id}`,
      username: `user${id}`,
      phoneNumber: opts.phoneNumber ?? null,
    });
    return this;
  }

  async findProfile(userId: string): Promise<PublicProfile | null> {
    return this.profiles.get(userId) ?? null;
  }
}

/** Records what a connected client would have received. */
export class FakeSession implements SessionHandle {
  readonly received: { event: string; payload: unknown }[] = [];

  constructor(
    readonly id: string,
    private readonly failing = false,
  ) {}

  emit(event: string, payload: unknown): boolean {
    if (this.failing) throw new Error('socket closed');
    this.received.push({ event, payload });
    return true;
  }

  payloadsOf(event: string): unknown[] {
    return this.received.filter((r) => r.event === event).map((r) => r.payload);
  }
}

/** A mongoose query chain that resolves to `value` however it is refined. */
export type Query<T> = {
  exec(): Promise<T>;
  lean(): Query<T>;
  sort(spec?: object): Query<T>;
  skip(n?: number): Query<T>;
  limit(n?: number): Query<T>;
};

export function query<T>(value: T): Query<T> {
  const q: Query<T> = { exec: async () => value, lean: () => q, sort: () => q, skip: () => q, limit: () => q };
  return q;
}

export function principal(userId: string, displayName = `User ${userId}`): Principal {
  return { userId, username: `user${userId}`, displayName };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): ConfigService<AppConfig, true> {
  return new ConfigService<AppConfig, true>(loadConfig(env));
}
