// src/infra/rate-limit/rate-limit.service.ts

import { Injectable, HttpException, HttpStatus } from '@nestjs/common';

type Bucket = { resetAt: number; count: number };
type Policy = { limit: number; windowMs: number };

// per-user policy by action
const POLICIES: Record<string, Policy> = {
  signal: { limit: 120, windowMs: 60_000 },
  call: { limit: 60, windowMs: 60_000 },
  message: { limit: 25, windowMs: 5_000 },
  sms: { limit: 10, windowMs: 60_000 },
};
const DEFAULT_POLICY: Policy = { limit: 60, windowMs: 60_000 };
const SWEEP_EVERY_MS = 60_000;

@Injectable()
export class RateLimitService {
  private buckets = new Map<string, Bucket>();
  private lastSweepAt = Date.now();

  assert(userId: string, action: string) {
    const policy = POLICIES[action] ?? DEFAULT_POLICY;
    this.assertAllowed({ key: `${action}:${userId}`, ...policy });
  }

  assertAllowed(opts: { key: string; limit: number; windowMs: number }) {
    const now = Date.now();
    if (now - this.lastSweepAt >= SWEEP_EVERY_MS) this.sweep(now);

    const b = this.buckets.get(opts.key);

    if (!b || now >= b.resetAt) {
      this.buckets.set(opts.key, { resetAt: now + opts.windowMs, count: 1 });
      return;
    }

    b.count += 1;

    if (b.count > opts.limit) {
      throw new HttpException('Too many requests', HttpStatus.TOO_MANY_REQUESTS);
    }
  }

  trackedKeys(): number {
    return this.buckets.size;
  }

  // drops every bucket whose window has ended
  private sweep(now: number) {
    for (const [key, b] of this.buckets) {
      if (now >= b.resetAt) this.buckets.delete(key);
    }
    this.lastSweepAt = now;
  }
}
