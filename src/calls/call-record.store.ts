// src/calls/call-record.store.ts

import type { CallStatus } from './call-state.machine';
import type { CallRecord, CallStatusPatch, ListCallsQuery, NewCallRecord } from './call-record';

export class DuplicateCallIdError extends Error {
  constructor(callId: string) {
    super(`call id already in use: ${callId}`);
    this.name = 'DuplicateCallIdError';
  }
}

/**
 * Durable keyed store for call records.
 * `compareAndSet` is the only way a status changes: it applies `patch` only while the
 * stored status still equals `expected`, so two racing writers cannot both win.
 */
export abstract class CallRecordStore {
  abstract driver(): 'mongo' | 'memory';
  /** @throws DuplicateCallIdError */
  abstract insert(record: NewCallRecord): Promise<CallRecord>;
  abstract findByCallId(callId: string): Promise<CallRecord | null>;
  /** Resolves null when the record is gone or its status moved away from `expected`. */
  abstract compareAndSet(callId: string, expected: CallStatus, patch: CallStatusPatch): Promise<CallRecord | null>;
  abstract delete(callId: string): Promise<boolean>;
  abstract listForUser(userId: string, query?: ListCallsQuery): Promise<CallRecord[]>;
  abstract list(query?: ListCallsQuery & { status?: CallStatus }): Promise<CallRecord[]>;
  abstract countForUser(userId: string): Promise<number>;
  abstract countByStatus(): Promise<Record<CallStatus, number>>;
  abstract countSince(since: Date): Promise<number>;
}
