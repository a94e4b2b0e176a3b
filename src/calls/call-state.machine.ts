// src/calls/call-state.machine.ts

import { InvalidTransitionError } from '../common/errors';

export const CALL_STATUSES = ['initiated', 'ringing', 'answered', 'ended', 'missed', 'failed'] as const;
export type CallStatus = (typeof CALL_STATUSES)[number];

export const CALL_KINDS = ['voice', 'video'] as const;
export type CallKind = (typeof CALL_KINDS)[number];

export const TERMINAL_STATUSES: ReadonlySet<CallStatus> = new Set<CallStatus>(['ended', 'missed', 'failed']);

/** from -> allowed targets. Terminal states have no way out. */
export const CALL_TRANSITIONS: Readonly<Record<CallStatus, readonly CallStatus[]>> = {
  initiated: ['ringing', 'answered', 'missed', 'failed'],
  ringing: ['answered', 'missed', 'failed'],
  answered: ['ended'],
  ended: [],
  missed: [],
  failed: [],
};

export function isTerminal(status: CallStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function canTransition(from: CallStatus, to: CallStatus): boolean {
  return CALL_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: CallStatus, to: CallStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(`Cannot move call from ${from} to ${to}`);
  }
}

export function isCallStatus(v: unknown): v is CallStatus {
  return CALL_STATUSES.some((s) => s === v);
}

export function isCallKind(v: unknown): v is CallKind {
  return CALL_KINDS.some((k) => k === v);
}

/** Whole seconds between answer and end, never negative. */
export function callDurationSeconds(answeredAt: Date, endedAt: Date): number {
  return Math.max(0, Math.floor((endedAt.getTime() - answeredAt.getTime()) / 1000));
}

export function emptyStatusCounts(): Record<CallStatus, number> {
  return { initiated: 0, ringing: 0, answered: 0, ended: 0, missed: 0, failed: 0 };
}
