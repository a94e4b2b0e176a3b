// src/calls/mongo-call-record.store.ts

import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, mongo } from 'mongoose';

import { CallStatus, emptyStatusCounts, isCallStatus } from './call-state.machine';
import { CallRecord, CallStatusPatch, ListCallsQuery, NewCallRecord } from './call-record';
import { CallRecordStore, DuplicateCallIdError } from './call-record.store';
import { Call, CallDocument } from './call.schema';

function toRecord(row: Call): CallRecord {
  return {
    callId: row.callId,
    callerId: row.callerId,
    calleeId: row.calleeId ?? null,
    destinationNumber: row.destinationNumber ?? null,
    kind: row.kind,
    status: row.status,
    createdAt: row.createdAt,
    ringingAt: row.ringingAt ?? null,
    answeredAt: row.answeredAt ?? null,
    endedAt: row.endedAt ?? null,
    duration: row.duration ?? null,
    isInternational: Boolean(row.isInternational),
    destinationCountry: row.destinationCountry ?? null,
    trunkId: row.trunkId ?? null,
    cost: row.cost ?? null,
    endedBy: row.endedBy ?? null,
    endReason: row.endReason ?? null,
  };
}

@Injectable()
export class MongoCallRecordStore extends CallRecordStore {
  constructor(@InjectModel(Call.name) private readonly model: Model<CallDocument>) {
    super();
  }

  driver(): 'mongo' {
    return 'mongo';
  }

  async insert(input: NewCallRecord): Promise<CallRecord> {
    try {
      const doc = await this.model.create({
        callId: input.callId,
        callerId: input.callerId,
        calleeId: input.calleeId,
        destinationNumber: input.destinationNumber,
        kind: input.kind,
        status: 'initiated',
        isInternational: input.isInternational ?? false,
        destinationCountry: input.destinationCountry ?? null,
        trunkId: input.trunkId ?? null,
        ...(input.createdAt ? { createdAt: input.createdAt } : {}),
      });
      return toRecord(doc.toObject());
    } catch (e) {
      if (e instanceof mongo.MongoServerError && e.code === 11000) {
        throw new DuplicateCallIdError(input.callId);
      }
      throw e;
    }
  }

  async findByCallId(callId: string): Promise<CallRecord | null> {
    const row = await this.model.findOne({ callId }).lean<Call>().exec();
    return row ? toRecord(row) : null;
  }

  async compareAndSet(callId: string, expected: CallStatus, patch: CallStatusPatch): Promise<CallRecord | null> {
    // single round trip: the status filter is the lock
    const row = await this.model
      .findOneAndUpdate({ callId, status: expected }, { $set: patch }, { new: true })
      .lean<Call>()
      .exec();
    return row ? toRecord(row) : null;
  }

  async delete(callId: string): Promise<boolean> {
    const res = await this.model.deleteOne({ callId }).exec();
    return res.deletedCount > 0;
  }

  async listForUser(userId: string, query: ListCallsQuery = {}): Promise<CallRecord[]> {
    return this.select({ $or: [{ callerId: userId }, { calleeId: userId }] }, query);
  }

  async list(query: ListCallsQuery & { status?: CallStatus } = {}): Promise<CallRecord[]> {
    return this.select(query.status ? { status: query.status } : {}, query);
  }

  async countForUser(userId: string): Promise<number> {
    return this.model.countDocuments({ $or: [{ callerId: userId }, { calleeId: userId }] }).exec();
  }

  async countByStatus(): Promise<Record<CallStatus, number>> {
    const rows = await this.model
      .aggregate<{ _id: string; count: number }>([{ $group: { _id: '$status', count: { $sum: 1 } } }])
      .exec();

    const counts = emptyStatusCounts();
    for (const r of rows) {
      if (isCallStatus(r._id)) counts[r._id] = r.count;
    }
    return counts;
  }

  async countSince(since: Date): Promise<number> {
    return this.model.countDocuments({ createdAt: { $gte: since } }).exec();
  }

  private async select(filter: FilterQuery<CallDocument>, query: ListCallsQuery): Promise<CallRecord[]> {
    const q: FilterQuery<CallDocument> = query.before ? { ...filter, createdAt: { $lt: query.before } } : filter;
    const rows = await this.model
      .find(q)
      .sort({ createdAt: -1 })
      .limit(query.limit ?? 50)
      .lean<Call[]>()
      .exec();
    return rows.map(toRecord);
  }
}
