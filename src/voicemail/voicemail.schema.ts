// src/voicemail/voicemail.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type VoicemailDocument = HydratedDocument<Voicemail>;

@Schema({ collection: 'voicemails', timestamps: true })
export class Voicemail {
  @Prop({ type: String, required: true, index: true })
  recipientId!: string;

  @Prop({ type: String, required: true })
  callerNumber!: string;

  @Prop({ type: String, default: null })
  callerName?: string | null;

  @Prop({ type: String, required: true })
  audioUrl!: string;

  // seconds
  @Prop({ type: Number, default: 0, min: 0 })
  duration!: number;

  @Prop({ type: Boolean, default: false })
  isRead!: boolean;

  @Prop({ type: Boolean, default: false })
  isArchived!: boolean;

  createdAt?: Date;
}

export const VoicemailSchema = SchemaFactory.createForClass(Voicemail);

VoicemailSchema.index({ recipientId: 1, createdAt: -1 });
