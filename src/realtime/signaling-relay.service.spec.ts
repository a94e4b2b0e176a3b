import { HttpException } from '@nestjs/common';

import { CallsService } from '../calls/calls.service';
import { MemoryCallRecordStore } from '../calls/memory-call-record.store';
import { UnauthorizedError, ValidationError } from '../common/errors';
import { RateLimitService } from '../infra/rate-limit/rate-limit.service';
import { MetricsService } from '../observability/metrics.service';
import { FakeSession, FakeUserDirectory, principal, testConfig } from '../testing/fakes';
import { EVT } from './realtime.types';
import { SignalingRelayService } from './signaling-relay.service';
import { UserChannelRegistry } from './user-channel.registry';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SignalingRelayService', () => {
  const alice = principal('u1', 'Alice Example');
  const bob = principal('u2', 'Bob Example');
  const carol = principal('u3');

  let calls: CallsService;
  let channels: UserChannelRegistry;
  let metrics: MetricsService;
  let rate: RateLimitService;
  let relay: SignalingRelayService;
  let aliceSession: FakeSession;
  let bobSession: FakeSession;

  function build(env: NodeJS.ProcessEnv = {}) {
    metrics = new MetricsService();
    rate = new RateLimitService();
    calls = new CallsService(new MemoryCallRecordStore(), new FakeUserDirectory().add('u1').add('u2').add('u3'), metrics);
    channels = new UserChannelRegistry();
    relay = new SignalingRelayService(calls, channels, metrics, rate, testConfig(env));

    aliceSession = new FakeSession('s-alice');
    bobSession = new FakeSession('s-bob');
    channels.attach('u1', aliceSession);
    channels.attach('u2', bobSession);
  }

  beforeEach(() => build());

  afterEach(() => relay.onModuleDestroy());

  describe('a full call', () => {
    it('relays offer, answer and hang-up to the right party only', async () => {
      const offer = await relay.offer(alice, { callee: 'u2', payload: { sdp: 'offer-sdp' } });
      expect(offer.delivered).toBe(1);
      expect(bobSession.payloadsOf(EVT.WEBRTC_OFFER)).toEqual([
        {
          call_id: offer.call_id,
          offer: { sdp: 'offer-sdp' },
          caller: { id: 'u1', name: 'Alice Example', username: 'useru1' },
          call_type: 'voice',
        },
      ]);
      expect((await calls.getById(offer.call_id)).status).toBe('ringing');

      await relay.answer(bob, { callId: offer.call_id, payload: { sdp: 'answer-sdp' } });
      expect(aliceSession.payloadsOf(EVT.WEBRTC_ANSWER)).toEqual([
        { call_id: offer.call_id, answer: { sdp: 'answer-sdp' } },
      ]);
      expect(bobSession.payloadsOf(EVT.WEBRTC_ANSWER)).toEqual([]);
      expect((await calls.getById(offer.call_id)).status).toBe('answered');

      const ended = await relay.endCall(alice, { callId: offer.call_id });
      expect(ended).toEqual({ call_id: offer.call_id, status: 'ended', duration: 0 });
      expect(bobSession.payloadsOf(EVT.CALL_ENDED)).toEqual([{ call_id: offer.call_id, status: 'ended', duration: 0 }]);
      expect(aliceSession.payloadsOf(EVT.CALL_ENDED)).toEqual([]);
    });

    it('acknowledges a repeated hang-up without announcing it again', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      await relay.answerCall(bob, { callId: call_id });
      await relay.endCall(bob, { callId: call_id });

      const again = await relay.endCall(bob, { callId: call_id });
      expect(again.status).toBe('ended');
      expect(aliceSession.payloadsOf(EVT.CALL_ENDED)).toHaveLength(1);
    });

    it('refuses a hang-up from someone outside the call', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });

      await expect(relay.endCall(carol, { callId: call_id })).rejects.toBeInstanceOf(UnauthorizedError);
      expect((await calls.getById(call_id)).status).toBe('ringing');
      expect(bobSession.payloadsOf(EVT.CALL_ENDED)).toEqual([]);
    });

    it('announces the answer once when the SDP answer comes before answer_call', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      await relay.answer(bob, { callId: call_id, payload: { sdp: 'answer-sdp' } });
      const state = await relay.answerCall(bob, { callId: call_id });

      expect(state.status).toBe('answered');
      expect(aliceSession.payloadsOf(EVT.CALL_ANSWERED)).toEqual([
        { call_id, callee: { id: 'u2', name: 'Bob Example' } },
      ]);
    });

    it('does not repeat call_answered when the SDP answer follows answer_call', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      await relay.answerCall(bob, { callId: call_id });
      await relay.answer(bob, { callId: call_id, payload: {} });

      expect(aliceSession.payloadsOf(EVT.CALL_ANSWERED)).toHaveLength(1);
      expect(aliceSession.payloadsOf(EVT.WEBRTC_ANSWER)).toHaveLength(1);
    });

    it('announces answer_call to the caller once', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {}, kind: 'video' });
      await relay.answerCall(bob, { callId: call_id });
      await relay.answerCall(bob, { callId: call_id });

      expect(aliceSession.payloadsOf(EVT.CALL_ANSWERED)).toEqual([
        { call_id, callee: { id: 'u2', name: 'Bob Example' } },
      ]);
      expect(bobSession.payloadsOf(EVT.CALL_ANSWERED)).toEqual([]);
    });
  });

  describe('offer', () => {
    it('leaves the call initiated when the callee is offline', async () => {
      channels.detach('u2', 's-bob');
      const res = await relay.offer(alice, { callee: 'u2', payload: {} });

      expect(res.delivered).toBe(0);
      expect((await calls.getById(res.call_id)).status).toBe('initiated');
      expect(metrics.counter('relay_dropped_total', { event: EVT.WEBRTC_OFFER })).toBe(1);
    });

    it('reaches every session of the callee', async () => {
      const phone = new FakeSession('s-bob-phone');
      channels.attach('u2', phone);

      const res = await relay.offer(alice, { callee: 'u2', payload: {} });
      expect(res.delivered).toBe(2);
      expect(phone.payloadsOf(EVT.WEBRTC_OFFER)).toHaveLength(1);
      expect(metrics.counter('relay_deliveries_total', { event: EVT.WEBRTC_OFFER })).toBe(2);
    });

    it('refuses an unknown callee before anything is sent', async () => {
      await expect(relay.offer(alice, { callee: 'ghost', payload: {} })).rejects.toThrow('User not found');
    });
  });

  describe('answer', () => {
    it('accepts an SDP answer only from the callee', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });

      await expect(relay.answer(alice, { callId: call_id, payload: {} })).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(relay.answer(carol, { callId: call_id, payload: {} })).rejects.toBeInstanceOf(UnauthorizedError);
      expect(aliceSession.payloadsOf(EVT.WEBRTC_ANSWER)).toEqual([]);
    });

    it('reports an unknown call', async () => {
      await expect(relay.answer(bob, { callId: 'missing', payload: {} })).rejects.toThrow('Call not found');
    });
  });

  describe('iceCandidate', () => {
    it('forwards candidates verbatim to the other party', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      const candidate = { candidate: 'candidate:1 1 udp 2122260223 10.0.0.2 54321 typ host', sdpMLineIndex: 0 };

      const res = await relay.iceCandidate(alice, { callId: call_id, target: 'u2', payload: candidate });

      expect(res.delivered).toBe(1);
      expect(bobSession.payloadsOf(EVT.WEBRTC_ICE_CANDIDATE)).toEqual([{ call_id, candidate, from: 'u1' }]);
      expect((await calls.getById(call_id)).status).toBe('ringing');
    });

    it('drops silently when the target has no session', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      channels.detach('u1', 's-alice');

      const res = await relay.iceCandidate(bob, { callId: call_id, target: 'u1', payload: {} });
      expect(res.delivered).toBe(0);
    });

    it('forwards to whichever user the sender names', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      const carolSession = new FakeSession('s-carol');
      channels.attach('u3', carolSession);

      const res = await relay.iceCandidate(alice, { callId: call_id, target: 'u3', payload: { candidate: 'c' } });
      expect(res).toEqual({ call_id, delivered: 1 });
      expect(carolSession.payloadsOf(EVT.WEBRTC_ICE_CANDIDATE)).toEqual([
        { call_id, candidate: { candidate: 'c' }, from: 'u1' },
      ]);
    });

    it('acknowledges a candidate for an offline user outside the call', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });

      await expect(relay.iceCandidate(alice, { callId: call_id, target: 'u99', payload: {} })).resolves.toEqual({
        call_id,
        delivered: 0,
      });
      expect(metrics.counter('relay_dropped_total', { event: EVT.WEBRTC_ICE_CANDIDATE })).toBe(1);
    });

    it('refuses a sender outside the call', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      await expect(relay.iceCandidate(carol, { callId: call_id, target: 'u2', payload: {} })).rejects.toBeInstanceOf(
        UnauthorizedError,
      );
    });
  });

  describe('dispatch', () => {
    it('routes a valid envelope by type', async () => {
      const res = await relay.dispatch(alice, { type: 'offer', target: 'u2', payload: { sdp: 'x' }, kind: 'video' });
      expect(res).toMatchObject({ delivered: 1 });
      expect(metrics.counter('relay_messages_total', { type: 'offer' })).toBe(1);

      const [offer] = bobSession.payloadsOf(EVT.WEBRTC_OFFER);
      expect(offer).toMatchObject({ call_type: 'video' });
    });

    it('uses a caller-chosen call id', async () => {
      const res = await relay.dispatch(alice, { type: 'offer', call_id: 'call-42', target: 'u2', payload: {} });
      expect(res).toEqual({ call_id: 'call-42', delivered: 1 });
    });

    it('rejects a malformed envelope', async () => {
      await expect(relay.dispatch(alice, { type: 'answer' })).rejects.toBeInstanceOf(ValidationError);
    });

    it('applies the signal rate limit', async () => {
      const assert = jest.spyOn(rate, 'assert').mockImplementation(() => {
        throw new HttpException('Too many requests', 429);
      });

      await expect(relay.dispatch(alice, { type: 'end_call', call_id: 'c1' })).rejects.toThrow('Too many requests');
      expect(assert).toHaveBeenCalledWith('u1', 'signal');
    });
  });

  describe('incoming call over HTTP', () => {
    it('rings the callee and moves the call to ringing', async () => {
      const call = await calls.create('u1', { calleeId: 'u2' });
      const delivered = await relay.announceIncomingCall(call, alice);

      expect(delivered).toBe(1);
      expect(bobSession.payloadsOf(EVT.INCOMING_CALL)).toEqual([
        {
          call_id: call.callId,
          caller: { id: 'u1', name: 'Alice Example', username: 'useru1' },
          call_type: 'voice',
        },
      ]);
      expect((await calls.getById(call.callId)).status).toBe('ringing');
    });
  });

  describe('ringing timeout', () => {
    beforeEach(() => {
      relay.onModuleDestroy();
      build({ CALL_RING_TIMEOUT_MS: '20' });
    });

    it('marks an unanswered call missed and tells both parties', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      await sleep(80);

      expect((await calls.getById(call_id)).status).toBe('missed');
      const expected = { call_id, status: 'missed', duration: null, reason: 'timeout' };
      expect(aliceSession.payloadsOf(EVT.CALL_ENDED)).toEqual([expected]);
      expect(bobSession.payloadsOf(EVT.CALL_ENDED)).toEqual([expected]);
    });

    it('is cancelled by an answer', async () => {
      const { call_id } = await relay.offer(alice, { callee: 'u2', payload: {} });
      await relay.answerCall(bob, { callId: call_id });
      await sleep(80);

      expect((await calls.getById(call_id)).status).toBe('answered');
      expect(aliceSession.payloadsOf(EVT.CALL_ENDED)).toEqual([]);
    });
  });
});
