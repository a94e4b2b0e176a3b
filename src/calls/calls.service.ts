// src/calls/calls.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import { InternalError, NotFoundError, UnauthorizedError, ValidationError } from '../common/errors';
import { MetricsService } from '../observability/metrics.service';
import { UserDirectory } from '../users/user-directory';
import {
  assertTransition,
  callDurationSeconds,
  CallStatus,
  isCallKind,
  isCallStatus,
  isTerminal,
} from './call-state.machine';
import { CallRecord, CallStatusPatch, isParty } from './call-record';
import { CallRecordStore, DuplicateCallIdError } from './call-record.store';

export type CallTarget = { calleeId?: string | null; destinationNumber?: string | null };

export type CreateCallOptions = {
  callId?: string;
  isInternational?: boolean;
  destinationCountry?: string | null;
  trunkId?: string | null;
};

export type TransitionResult = { call: CallRecord; changed: boolean };

/** Picks the target status from the record as currently stored; null means "nothing to do". */
type Decide = (current: CallRecord) => CallStatus | null;

const MAX_CAS_ATTEMPTS = 3;

@Injectable()
export class CallsService {
  private readonly logger = new Logger(CallsService.name);

  constructor(
    private readonly store: CallRecordStore,
    private readonly users: UserDirectory,
    private readonly metrics: MetricsService,
  ) {}

  async create(
    callerId: string,
    target: CallTarget,
    kind: unknown = 'voice',
    opts: CreateCallOptions = {},
  ): Promise<CallRecord> {
    if (!callerId) throw new ValidationError('Caller is required');

    const calleeId = target.calleeId?.trim() || null;
    const destinationNumber = target.destinationNumber?.trim() || null;

    if (!calleeId && !destinationNumber) {
      throw new ValidationError('Callee ID or destination number required');
    }
    if (calleeId && destinationNumber) {
      throw new ValidationError('A call routes either to a callee or to a destination number, not both');
    }
    if (!isCallKind(kind)) {
      throw new ValidationError(`Invalid call type: ${String(kind)}`);
    }

    if (calleeId) {
      if (calleeId === callerId) throw new ValidationError('Cannot call yourself');
      const callee = await this.users.findProfile(calleeId);
      if (!callee) throw new NotFoundError('User not found');
    }

    const callId = opts.callId?.trim() || randomUUID();

    let call: CallRecord;
    try {
      call = await this.store.insert({
        callId,
        callerId,
        calleeId,
        destinationNumber,
        kind,
        isInternational: opts.isInternational ?? false,
        destinationCountry: opts.destinationCountry ?? null,
        trunkId: opts.trunkId ?? null,
      });
    } catch (e) {
      if (e instanceof DuplicateCallIdError) throw new ValidationError('call_id already in use');
      throw e;
    }

    this.metrics.inc('calls_created_total', { kind, route: calleeId ? 'internal' : 'external' });
    this.logger.log(`call created id=${call.callId} caller=${callerId} ${calleeId ? `callee=${calleeId}` : `dest=${destinationNumber}`}`);
    return call;
  }

  async getById(callId: string): Promise<CallRecord> {
    const call = callId ? await this.store.findByCallId(callId) : null;
    if (!call) throw new NotFoundError('Call not found');
    return call;
  }

  /** The single capability check every mutating path goes through. */
  assertParty(call: CallRecord, actorId: string): void {
    if (!isParty(call, actorId)) throw new UnauthorizedError('Not authorized to access this call');
  }

  async getForParty(callId: string, actorId: string): Promise<CallRecord> {
    const call = await this.getById(callId);
    this.assertParty(call, actorId);
    return call;
  }

  async isParty(callId: string, userId: string): Promise<boolean> {
    const call = await this.store.findByCallId(callId);
    return call ? isParty(call, userId) : false;
  }

  async updateStatus(callId: string, newStatus: unknown, actorId: string, reason?: string): Promise<CallRecord> {
    if (!isCallStatus(newStatus)) throw new ValidationError(`Invalid call status: ${String(newStatus)}`);

    const call = await this.getForParty(callId, actorId);
    // ending an already finished call is a retry, not a mistake
    const res = await this.transition(
      call,
      (c) => (newStatus === 'ended' && isTerminal(c.status) ? null : newStatus),
      actorId,
      reason,
    );
    return res.call;
  }

  async markRinging(callId: string, actorId: string): Promise<TransitionResult> {
    const call = await this.getForParty(callId, actorId);
    return this.transition(call, (c) => (c.status === 'initiated' ? 'ringing' : null), actorId);
  }

  async answer(callId: string, actorId: string): Promise<TransitionResult> {
    const call = await this.getById(callId);
    this.assertParty(call, actorId);
    if (call.calleeId !== actorId) throw new UnauthorizedError('Not authorized to answer this call');

    return this.transition(call, (c) => (c.status === 'answered' ? null : 'answered'), actorId);
  }

  /**
   * Hang up. Before an answer the caller's hang-up leaves the call missed and the
   * callee's is a rejection (failed). Terminal calls come back unchanged.
   */
  async end(callId: string, actorId: string, reason?: string): Promise<TransitionResult> {
    const call = await this.getForParty(callId, actorId);

    return this.transition(
      call,
      (c) => {
        if (isTerminal(c.status)) return null;
        if (c.status === 'answered') return 'ended';
        return actorId === c.callerId ? 'missed' : 'failed';
      },
      actorId,
      reason ?? (actorId === call.callerId ? 'hangup' : 'rejected'),
    );
  }

  /** Ringing timeout. No actor: the system gives up on the callee. */
  async expireRinging(callId: string): Promise<TransitionResult | null> {
    const call = await this.store.findByCallId(callId);
    if (!call) return null;
    return this.transition(
      call,
      (c) => (c.status === 'initiated' || c.status === 'ringing' ? 'missed' : null),
      null,
      'timeout',
    );
  }

  async delete(callId: string): Promise<void> {
    const removed = callId ? await this.store.delete(callId) : false;
    if (!removed) throw new NotFoundError('Call not found');
    this.logger.log(`call deleted id=${callId}`);
  }

  async listForUser(userId: string, input: { limit?: number; before?: string } = {}): Promise<CallRecord[]> {
    return this.store.listForUser(userId, this.listQuery(input));
  }

  async list(input: { limit?: number; before?: string; status?: string } = {}): Promise<CallRecord[]> {
    const status = isCallStatus(input.status) ? input.status : undefined;
    return this.store.list({ ...this.listQuery(input), status });
  }

  countForUser(userId: string): Promise<number> {
    return this.store.countForUser(userId);
  }

  countByStatus(): Promise<Record<CallStatus, number>> {
    return this.store.countByStatus();
  }

  countSince(since: Date): Promise<number> {
    return this.store.countSince(since);
  }

  private listQuery(input: { limit?: number; before?: string }) {
    const raw = Number(input.limit);
    const limit = Number.isFinite(raw) && raw > 0 ? Math.min(Math.floor(raw), 200) : 50;

    let before: Date | undefined;
    if (input.before) {
      const d = new Date(input.before);
      if (!Number.isNaN(d.getTime())) before = d;
    }
    return { limit, before };
  }

  /**
   * Applies `decide` against the stored record with a compare-and-set on its status.
   * A lost race re-reads and decides again, so the loser of two concurrent hang-ups
   * gets the no-op outcome instead of an error.
   */
  private async transition(
    call: CallRecord,
    decide: Decide,
    actorId: string | null,
    reason?: string,
  ): Promise<TransitionResult> {
    let current = call;

    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt += 1) {
      const to = decide(current);
      if (to === null) return { call: current, changed: false };

      assertTransition(current.status, to);

      const patch = this.stampsFor(current, to, actorId, reason, new Date());
      const updated = await this.store.compareAndSet(current.callId, current.status, patch);
      if (updated) {
        this.metrics.inc('call_transitions_total', { from: current.status, to });
        this.logger.log(`call ${current.callId} ${current.status} -> ${to} by=${actorId ?? 'system'}`);
        return { call: updated, changed: true };
      }

      const fresh = await this.store.findByCallId(current.callId);
      if (!fresh) throw new NotFoundError('Call not found');
      this.logger.debug(`call ${current.callId} moved to ${fresh.status} concurrently, re-evaluating`);
      current = fresh;
    }

    throw new InternalError('Call is being modified concurrently, try again');
  }

  private stampsFor(
    call: CallRecord,
    to: CallStatus,
    actorId: string | null,
    reason: string | undefined,
    now: Date,
  ): CallStatusPatch {
    switch (to) {
      case 'ringing':
        return { status: to, ringingAt: now };
      case 'answered':
        return { status: to, answeredAt: now };
      case 'ended':
        return {
          status: to,
          endedAt: now,
          duration: call.answeredAt ? callDurationSeconds(call.answeredAt, now) : null,
          endedBy: actorId,
          endReason: reason ?? 'hangup',
        };
      case 'missed':
      case 'failed':
        return { status: to, endedAt: now, endedBy: actorId, endReason: reason ?? null };
      case 'initiated':
        // unreachable: nothing transitions back to initiated, assertTransition already threw
        return { status: to };
    }
  }
}
