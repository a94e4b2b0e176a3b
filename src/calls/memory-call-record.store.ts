// src/calls/memory-call-record.store.ts

import { Injectable } from '@nestjs/common';
import { CallStatus, emptyStatusCounts } from './call-state.machine';
import { CallRecord, CallStatusPatch, isParty, ListCallsQuery, NewCallRecord } from './call-record';
import { CallRecordStore, DuplicateCallIdError } from './call-record.store';

type Row = { seq: number; record: CallRecord };

/**
 * Process-local driver. Every method body runs without awaiting in between,
 * so a compare-and-set cannot interleave with another write on the event loop.
 */
@Injectable()
export class MemoryCallRecordStore extends CallRecordStore {
  private readonly rows = new Map<string, Row>();
  private seq = 0;

  driver(): 'memory' {
    return 'memory';
  }

  async insert(input: NewCallRecord): Promise<CallRecord> {
    if (this.rows.has(input.callId)) throw new DuplicateCallIdError(input.callId);

    const record: CallRecord = {
      callId: input.callId,
      callerId: input.callerId,
      calleeId: input.calleeId,
      destinationNumber: input.destinationNumber,
      kind: input.kind,
      status: 'initiated',
      createdAt: input.createdAt ?? new Date(),
      ringingAt: null,
      answeredAt: null,
      endedAt: null,
      duration: null,
      isInternational: input.isInternational ?? false,
      destinationCountry: input.destinationCountry ?? null,
      trunkId: input.trunkId ?? null,
      cost: null,
      endedBy: null,
      endReason: null,
    };
    this.rows.set(record.callId, { seq: ++this.seq, record });
    return { ...record };
  }

  async findByCallId(callId: string): Promise<CallRecord | null> {
    const row = this.rows.get(callId);
    return row ? { ...row.record } : null;
  }

  async compareAndSet(callId: string, expected: CallStatus, patch: CallStatusPatch): Promise<CallRecord | null> {
    const row = this.rows.get(callId);
    if (!row || row.record.status !== expected) return null;

    row.record = { ...row.record, ...patch };
    return { ...row.record };
  }

  async delete(callId: string): Promise<boolean> {
    return this.rows.delete(callId);
  }

  async listForUser(userId: string, query: ListCallsQuery = {}): Promise<CallRecord[]> {
    return this.select((r) => isParty(r, userId), query);
  }

  async list(query: ListCallsQuery & { status?: CallStatus } = {}): Promise<CallRecord[]> {
    return this.select((r) => !query.status || r.status === query.status, query);
  }

  async countForUser(userId: string): Promise<number> {
    let n = 0;
    for (const { record } of this.rows.values()) if (isParty(record, userId)) n += 1;
    return n;
  }

  async countByStatus(): Promise<Record<CallStatus, number>> {
    const counts = emptyStatusCounts();
    for (const { record } of this.rows.values()) counts[record.status] += 1;
    return counts;
  }

  async countSince(since: Date): Promise<number> {
    let n = 0;
    for (const { record } of this.rows.values()) if (record.createdAt >= since) n += 1;
    return n;
  }

  private select(match: (r: CallRecord) => boolean, query: ListCallsQuery): CallRecord[] {
    const before = query.before;
    return [...this.rows.values()]
      .filter(({ record }) => match(record) && (!before || record.createdAt < before))
      .sort((a, b) => b.record.createdAt.getTime() - a.record.createdAt.getTime() || b.seq - a.seq)
      .slice(0, query.limit ?? 50)
      .map(({ record }) => ({ ...record }));
  }
}
