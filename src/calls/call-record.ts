// src/calls/call-record.ts

import type { CallKind, CallStatus } from './call-state.machine';

export type CallRecord = {
  callId: string;
  callerId: string;
  calleeId: string | null;
  destinationNumber: string | null;
  kind: CallKind;
  status: CallStatus;
  createdAt: Date;
  ringingAt: Date | null;
  answeredAt: Date | null;
  endedAt: Date | null;
  duration: number | null;
  isInternational: boolean;
  destinationCountry: string | null;
  trunkId: string | null;
  cost: number | null;
  endedBy: string | null;
  endReason: string | null;
};

export type NewCallRecord = Pick<CallRecord, 'callId' | 'callerId' | 'calleeId' | 'destinationNumber' | 'kind'> &
  Partial<Pick<CallRecord, 'isInternational' | 'destinationCountry' | 'trunkId' | 'createdAt'>>;

/** Fields a status change may stamp. `status` itself is always part of the patch. */
export type CallStatusPatch = Pick<CallRecord, 'status'> &
  Partial<Pick<CallRecord, 'ringingAt' | 'answeredAt' | 'endedAt' | 'duration' | 'endedBy' | 'endReason'>>;

export type ListCallsQuery = { limit?: number; before?: Date };

export function isParty(call: Pick<CallRecord, 'callerId' | 'calleeId'>, userId: string): boolean {
  return call.callerId === userId || (call.calleeId !== null && call.calleeId === userId);
}

/** The other party of an internal call, null for external calls or non-parties. */
export function otherParty(call: Pick<CallRecord, 'callerId' | 'calleeId'>, userId: string): string | null {
  if (call.callerId === userId) return call.calleeId;
  if (call.calleeId === userId) return call.callerId;
  return null;
}

export type CallView = {
  call_id: string;
  caller_id: string;
  callee_id: string | null;
  destination_number: string | null;
  call_type: CallKind;
  status: CallStatus;
  created_at: string;
  answered_at: string | null;
  ended_at: string | null;
  duration: number | null;
  is_international: boolean;
  destination_country: string | null;
  cost: number | null;
};

export function toCallView(c: CallRecord): CallView {
  return {
    call_id: c.callId,
    caller_id: c.callerId,
    callee_id: c.calleeId,
    destination_number: c.destinationNumber,
    call_type: c.kind,
    status: c.status,
    created_at: c.createdAt.toISOString(),
    answered_at: c.answeredAt?.toISOString() ?? null,
    ended_at: c.endedAt?.toISOString() ?? null,
    duration: c.duration,
    is_international: c.isInternational,
    destination_country: c.destinationCountry,
    cost: c.cost,
  };
}
