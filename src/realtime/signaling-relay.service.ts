// src/realtime/signaling-relay.service.ts

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { Principal } from '../auth/auth.types';
import { CallRecord, otherParty } from '../calls/call-record';
import type { CallKind, CallStatus } from '../calls/call-state.machine';
import { CallsService } from '../calls/calls.service';
import { errorMessage } from '../common/errors';
import type { AppConfig } from '../config/configuration';
import { RateLimitService } from '../infra/rate-limit/rate-limit.service';
import { MetricsService } from '../observability/metrics.service';
import { parseSignalEnvelope } from './signal-envelope.dto';
import { EVT, OutboundEvent, PartyRef, SignalPayload } from './realtime.types';
import { UserChannelRegistry } from './user-channel.registry';

export type OfferInput = { callee: string; payload: SignalPayload; kind?: CallKind; callId?: string };
export type AnswerInput = { callId: string; payload: SignalPayload };
export type IceInput = { callId: string; target: string; payload: SignalPayload };
export type EndInput = { callId: string; reason?: string };

export type OfferResult = { call_id: string; delivered: number };
export type ForwardResult = { call_id: string; delivered: number };
export type CallStateResult = { call_id: string; status: CallStatus; duration: number | null };
export type RelayResult = OfferResult | ForwardResult | CallStateResult;

function callerRef(p: Principal): PartyRef {
  return { id: p.userId, name: p.displayName, username: p.username };
}

/**
 * Routes call signaling between the two parties of a call and keeps the call
 * record in step. Knows nothing about the transport: sessions come from the
 * channel registry, senders arrive already authenticated.
 */
@Injectable()
export class SignalingRelayService implements OnModuleDestroy {
  private readonly logger = new Logger(SignalingRelayService.name);
  private readonly ringTimers = new Map<string, NodeJS.Timeout>();
  private readonly ringTimeoutMs: number;

  constructor(
    private readonly calls: CallsService,
    private readonly channels: UserChannelRegistry,
    private readonly metrics: MetricsService,
    private readonly rate: RateLimitService,
    config: ConfigService<AppConfig, true>,
  ) {
    this.ringTimeoutMs = config.get('calls', { infer: true }).ringTimeoutMs;
  }

  onModuleDestroy() {
    for (const t of this.ringTimers.values()) clearTimeout(t);
    this.ringTimers.clear();
  }

  /** Entry point for the socket transport: one envelope in, one ack body out. */
  async dispatch(sender: Principal, raw: unknown): Promise<RelayResult> {
    this.rate.assert(sender.userId, 'signal');
    const env = parseSignalEnvelope(raw);
    this.metrics.inc('relay_messages_total', { type: env.type });

    switch (env.type) {
      case 'offer':
        return this.offer(sender, { callee: env.target, payload: env.payload, kind: env.kind, callId: env.callId });
      case 'answer':
        return this.answer(sender, { callId: env.callId, payload: env.payload });
      case 'ice_candidate':
        return this.iceCandidate(sender, { callId: env.callId, target: env.target, payload: env.payload });
      case 'answer_call':
        return this.answerCall(sender, { callId: env.callId });
      case 'end_call':
        return this.endCall(sender, { callId: env.callId, reason: env.reason });
    }
  }

  async offer(sender: Principal, input: OfferInput): Promise<OfferResult> {
    const call = await this.calls.create(sender.userId, { calleeId: input.callee }, input.kind ?? 'voice', {
      callId: input.callId,
    });

    const delivered = this.send(input.callee, EVT.WEBRTC_OFFER, {
      call_id: call.callId,
      offer: input.payload,
      caller: callerRef(sender),
      call_type: call.kind,
    });

    await this.afterInvite(call, sender, delivered);
    return { call_id: call.callId, delivered };
  }

  /** HTTP initiate: the call exists already, the callee just needs to hear about it. */
  async announceIncomingCall(call: CallRecord, caller: Principal): Promise<number> {
    if (!call.calleeId) return 0;

    const delivered = this.send(call.calleeId, EVT.INCOMING_CALL, {
      call_id: call.callId,
      caller: callerRef(caller),
      call_type: call.kind,
    });

    await this.afterInvite(call, caller, delivered);
    return delivered;
  }

  /**
   * SDP answer. Only the callee may send one; it goes to the caller only.
   * When it is what moves the call to answered, the caller also gets call_answered.
   */
  async answer(sender: Principal, input: AnswerInput): Promise<ForwardResult> {
    const { call, changed } = await this.calls.answer(input.callId, sender.userId);
    this.clearRingTimer(call.callId);

    const delivered = this.send(call.callerId, EVT.WEBRTC_ANSWER, {
      call_id: call.callId,
      answer: input.payload,
    });
    if (changed) this.announceAnswered(call, sender);
    return { call_id: call.callId, delivered };
  }

  /** The sender must be a party; the target is whoever the sender names. */
  async iceCandidate(sender: Principal, input: IceInput): Promise<ForwardResult> {
    const call = await this.calls.getForParty(input.callId, sender.userId);

    const delivered = this.send(input.target, EVT.WEBRTC_ICE_CANDIDATE, {
      call_id: call.callId,
      candidate: input.payload,
      from: sender.userId,
    });
    return { call_id: call.callId, delivered };
  }

  async answerCall(sender: Principal, input: { callId: string }): Promise<CallStateResult> {
    const { call, changed } = await this.calls.answer(input.callId, sender.userId);
    this.clearRingTimer(call.callId);

    // whichever of answer / answer_call lands first announces it
    if (changed) this.announceAnswered(call, sender);
    return this.stateOf(call);
  }

  async endCall(sender: Principal, input: EndInput): Promise<CallStateResult> {
    const { call, changed } = await this.calls.end(input.callId, sender.userId, input.reason);
    this.clearRingTimer(call.callId);

    const other = otherParty(call, sender.userId);
    // a repeated hang-up is acknowledged but not re-announced
    if (changed && other) {
      this.send(other, EVT.CALL_ENDED, { call_id: call.callId, status: call.status, duration: call.duration });
    }
    return this.stateOf(call);
  }

  private announceAnswered(call: CallRecord, callee: Principal) {
    this.send(call.callerId, EVT.CALL_ANSWERED, {
      call_id: call.callId,
      callee: { id: callee.userId, name: callee.displayName },
    });
  }

  private async afterInvite(call: CallRecord, caller: Principal, delivered: number) {
    if (delivered > 0) await this.calls.markRinging(call.callId, caller.userId);
    this.armRingTimer(call.callId);
  }

  private stateOf(call: CallRecord): CallStateResult {
    return { call_id: call.callId, status: call.status, duration: call.duration };
  }

  private send(userId: string, event: OutboundEvent, payload: object): number {
    const delivered = this.channels.deliver(userId, event, payload);
    if (delivered > 0) {
      this.metrics.inc('relay_deliveries_total', { event }, delivered);
    } else {
      this.metrics.inc('relay_dropped_total', { event });
      this.logger.debug(`${event} for user=${userId} dropped: no live session`);
    }
    return delivered;
  }

  private armRingTimer(callId: string) {
    if (this.ringTimeoutMs <= 0) return;
    this.clearRingTimer(callId);

    const timer = setTimeout(() => void this.onRingTimeout(callId), this.ringTimeoutMs);
    timer.unref();
    this.ringTimers.set(callId, timer);
  }

  private clearRingTimer(callId: string) {
    const timer = this.ringTimers.get(callId);
    if (!timer) return;
    clearTimeout(timer);
    this.ringTimers.delete(callId);
  }

  private async onRingTimeout(callId: string) {
    this.ringTimers.delete(callId);
    try {
      const res = await this.calls.expireRinging(callId);
      if (!res?.changed) return;

      const { call } = res;
      const body = { call_id: call.callId, status: call.status, duration: call.duration, reason: 'timeout' };
      this.send(call.callerId, EVT.CALL_ENDED, body);
      if (call.calleeId) this.send(call.calleeId, EVT.CALL_ENDED, body);
      this.logger.log(`call ${callId} not answered within ${this.ringTimeoutMs}ms, marked missed`);
    } catch (e) {
      this.logger.error(`ring timeout for call ${callId} failed: ${errorMessage(e)}`);
    }
  }
}
