// src/auth/session-auth.service.ts

import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import https from 'https';

import type { AppConfig } from '../config/configuration';
import type { Principal } from './auth.types';

function redact(token: string) {
  if (!token) return '';
  return token.length <= 10 ? '***' : token.slice(0, 6) + '…' + token.slice(-4);
}

function ensureTrailingSlash(u: string) {
  return u.endsWith('/') ? u : u + '/';
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function text(v: unknown): string {
  return typeof v === 'string' || typeof v === 'number' ? String(v).trim() : '';
}

/**
 * Maps the identity service payload onto a Principal.
 * Accepts `{ userId | id | user_id, username, display_name | full_name | name, email }`.
 */
export function toPrincipal(data: unknown): Principal | null {
  if (!isRecord(data)) return null;

  const userId = text(data.userId ?? data.id ?? data.user_id);
  if (!userId) return null;

  const email = text(data.email);
  const username = text(data.username) || (email ? email.split('@')[0] : '') || `user${userId}`;
  const displayName =
    text(data.display_name) || text(data.full_name) || text(data.name) || username;

  return { userId, username, displayName };
}

@Injectable()
export class SessionAuthService {
  private readonly logger = new Logger(SessionAuthService.name);

  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  async introspect(token: string): Promise<Principal> {
    const auth = this.config.get('auth', { infer: true });
    if (!auth.introspectUrl) {
      this.logger.error('AUTH_INTROSPECT_URL is not configured');
      throw new UnauthorizedException('Authentication unavailable');
    }

    const url = ensureTrailingSlash(auth.introspectUrl);
    const httpsAgent = url.startsWith('https')
      ? new https.Agent({ rejectUnauthorized: !auth.tlsInsecure })
      : undefined;

    let data: unknown;
    try {
      const res = await axios.get<unknown>(url, {
        headers: {
          Authorization: `${auth.scheme} ${token}`,
          'X-Internal-Auth': auth.internalToken,
          Accept: 'application/json',
        },
        timeout: 4000,
        httpsAgent,
      });
      data = res.data;
    } catch (e) {
      const status = axios.isAxiosError(e) ? e.response?.status : undefined;
      this.logger.warn(
        `introspection failed url=${url} status=${status ?? '-'} token=${redact(token)}`,
      );
      throw new UnauthorizedException('Invalid token');
    }

    const principal = toPrincipal(data);
    if (!principal) {
      this.logger.error(
        `introspection returned no user id keys=${isRecord(data) ? Object.keys(data).join(',') : typeof data}`,
      );
      throw new UnauthorizedException('Invalid token payload');
    }
    return principal;
  }
}
