import { InvalidTransitionError } from '../common/errors';
import {
  assertTransition,
  CALL_STATUSES,
  callDurationSeconds,
  canTransition,
  isCallKind,
  isCallStatus,
  isTerminal,
} from './call-state.machine';

describe('call state machine', () => {
  it('allows the forward edges only', () => {
    expect(canTransition('initiated', 'ringing')).toBe(true);
    expect(canTransition('initiated', 'answered')).toBe(true);
    expect(canTransition('ringing', 'answered')).toBe(true);
    expect(canTransition('answered', 'ended')).toBe(true);
    expect(canTransition('initiated', 'missed')).toBe(true);
    expect(canTransition('ringing', 'failed')).toBe(true);

    expect(canTransition('ringing', 'initiated')).toBe(false);
    expect(canTransition('answered', 'missed')).toBe(false);
    expect(canTransition('initiated', 'ended')).toBe(false);
  });

  it('lets nothing leave a terminal status', () => {
    for (const from of ['ended', 'missed', 'failed'] as const) {
      expect(isTerminal(from)).toBe(true);
      for (const to of CALL_STATUSES) expect(canTransition(from, to)).toBe(false);
    }
    expect(isTerminal('answered')).toBe(false);
  });

  it('names both ends of a rejected transition', () => {
    expect(() => assertTransition('ended', 'answered')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('ended', 'answered')).toThrow('Cannot move call from ended to answered');
    expect(() => assertTransition('ringing', 'answered')).not.toThrow();
  });

  it('recognises statuses and kinds', () => {
    expect(isCallStatus('ringing')).toBe(true);
    expect(isCallStatus('RINGING')).toBe(false);
    expect(isCallStatus(3)).toBe(false);
    expect(isCallKind('video')).toBe(true);
    expect(isCallKind('fax')).toBe(false);
  });

  it('measures duration in whole seconds and never below zero', () => {
    const answered = new Date('2026-01-01T10:00:00.000Z');
    expect(callDurationSeconds(answered, new Date('2026-01-01T10:01:05.900Z'))).toBe(65);
    expect(callDurationSeconds(answered, new Date('2026-01-01T09:59:59.000Z'))).toBe(0);
  });
});
