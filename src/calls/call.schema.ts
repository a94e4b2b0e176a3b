// src/calls/call.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { CALL_KINDS, CALL_STATUSES, CallKind, CallStatus } from './call-state.machine';

export type CallDocument = HydratedDocument<Call>;

@Schema({ collection: 'calls', timestamps: true })
export class Call {
  // opaque, globally unique; server uuid unless the caller picked one
  @Prop({ type: String, required: true })
  callId!: string;

  @Prop({ type: String, required: true, index: true })
  callerId!: string;

  // null for external calls
  @Prop({ type: String, default: null, index: true })
  calleeId!: string | null;

  @Prop({ type: String, default: null })
  destinationNumber!: string | null;

  @Prop({ type: String, required: true, enum: CALL_KINDS, default: 'voice' })
  kind!: CallKind;

  @Prop({ type: String, required: true, enum: CALL_STATUSES, default: 'initiated', index: true })
  status!: CallStatus;

  @Prop({ type: Date, default: null })
  ringingAt!: Date | null;

  @Prop({ type: Date, default: null })
  answeredAt!: Date | null;

  @Prop({ type: Date, default: null })
  endedAt!: Date | null;

  // whole seconds, only once answered and ended
  @Prop({ type: Number, min: 0, default: null })
  duration!: number | null;

  @Prop({ type: Boolean, default: false })
  isInternational!: boolean;

  @Prop({ type: String, default: null })
  destinationCountry!: string | null;

  @Prop({ type: String, default: null })
  trunkId!: string | null;

  @Prop({ type: Number, min: 0, default: null })
  cost!: number | null;

  @Prop({ type: String, default: null })
  endedBy!: string | null;

  @Prop({ type: String, default: null })
  endReason!: string | null;

  createdAt!: Date;
  updatedAt!: Date;
}

export const CallSchema = SchemaFactory.createForClass(Call);

CallSchema.index({ callId: 1 }, { unique: true });

// "calls visible to user" queries
CallSchema.index({ callerId: 1, createdAt: -1 });
CallSchema.index({ calleeId: 1, createdAt: -1 });
CallSchema.index({ status: 1, createdAt: -1 });
